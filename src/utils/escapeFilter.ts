/**
 * Streaming filter for terminal query/response escape sequences.
 *
 * Programs running inside tmux query the terminal for its colors (OSC 4/10/11/12),
 * poke the clipboard (OSC 52) and send DCS strings. A browser renderer that is
 * not a real terminal answers none of these, and some renderers echo them back
 * as input, so they are removed before output is broadcast. Everything else,
 * including titles and CSI sequences, passes through untouched.
 *
 * Sequences may be split across chunks; the in-progress sequence is held until
 * the next call. Only terminated sequences are removed: a string cancelled by
 * CAN/SUB is dropped, and one broken by a line break, a stray control
 * character or a length past MAX_STRING_LENGTH is released as ordinary output.
 */

const ESC = '\x1b';
const BEL = '\x07';
const CAN = '\x18';
const SUB = '\x1a';

/** Longest OSC/DCS string held back before it is given up on */
export const MAX_STRING_LENGTH = 4096;

/** OSC command codes that are queries or clipboard writes */
export const FILTERED_OSC_CODES: ReadonlySet<string> = new Set(['4', '10', '11', '12', '17', '19', '52']);

const MAX_OSC_CODE_LENGTH = 4;

enum State {
  NORMAL,
  ESC_START, // Seen ESC
  OSC_CODE, // Seen ESC ], reading the numeric command
  OSC_BODY, // Inside a filtered OSC, holding
  OSC_BODY_ESC, // Inside a filtered OSC, seen ESC (maybe ST)
  DCS_BODY, // Inside ESC P ..., holding
  DCS_BODY_ESC, // Inside DCS, seen ESC (maybe ST)
}

/** Characters a held string may carry; BEL only matters to OSC, which it ends */
function isStringChar(char: string): boolean {
  const code = char.charCodeAt(0);
  return code >= 0x20 || code === 0x07 || code === 0x08 || code === 0x09 || code === 0x0b || code === 0x0c;
}

export class EscapeSequenceFilter {
  private state = State.NORMAL;
  private pending = '';

  reset(): void {
    this.state = State.NORMAL;
    this.pending = '';
  }

  /** True when part of a sequence is being held back */
  hasPending(): boolean {
    return this.state !== State.NORMAL;
  }

  filter(data: string): string {
    let output = '';
    let i = 0;

    while (i < data.length) {
      const char = data[i];

      switch (this.state) {
        case State.NORMAL:
          if (char === ESC) {
            this.pending = char;
            this.state = State.ESC_START;
          } else {
            output += char;
          }
          break;

        case State.ESC_START:
          if (char === ']') {
            this.pending += char;
            this.state = State.OSC_CODE;
          } else if (char === 'P') {
            this.pending += char;
            this.state = State.DCS_BODY;
          } else {
            output += this.release();
            continue; // Re-process this character
          }
          break;

        case State.OSC_CODE:
          if (char >= '0' && char <= '9' && this.pending.length - 2 < MAX_OSC_CODE_LENGTH) {
            this.pending += char;
          } else if (char === ';' && FILTERED_OSC_CODES.has(this.pending.slice(2))) {
            this.pending += char;
            this.state = State.OSC_BODY;
          } else {
            // Not one of ours: release what we held and let the rest flow through
            output += this.release();
            continue;
          }
          break;

        case State.OSC_BODY:
        case State.DCS_BODY:
          if (char === CAN || char === SUB) {
            this.reset();
          } else if (char === BEL && this.state === State.OSC_BODY) {
            this.reset();
          } else if (char === ESC) {
            this.pending += char;
            this.state = this.state === State.OSC_BODY ? State.OSC_BODY_ESC : State.DCS_BODY_ESC;
          } else if (!isStringChar(char)) {
            output += this.release();
            continue;
          } else {
            this.pending += char;
          }
          break;

        case State.OSC_BODY_ESC:
          if (char === '\\') {
            this.reset();
          } else {
            // Unterminated OSC interrupted by a new sequence
            this.pending = ESC;
            this.state = State.ESC_START;
            continue;
          }
          break;

        case State.DCS_BODY_ESC:
          if (char === '\\') {
            this.reset();
          } else {
            // tmux passthrough doubles ESC inside DCS payloads
            this.pending += char;
            if (char !== ESC) {
              this.state = State.DCS_BODY;
            }
          }
          break;
      }

      if (this.pending.length > MAX_STRING_LENGTH) {
        output += this.release();
      }
      i++;
    }

    return output;
  }

  /** Gives up on the held sequence and returns it verbatim */
  private release(): string {
    const held = this.pending;
    this.reset();
    return held;
  }

  /** Releases whatever is held; nothing unterminated is dropped at end of stream */
  flush(): string {
    return this.release();
  }
}

/** One-shot filtering of a complete string */
export function stripQuerySequences(data: string): string {
  const filter = new EscapeSequenceFilter();
  return filter.filter(data) + filter.flush();
}
