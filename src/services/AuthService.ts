import jwt, { type JwtPayload } from 'jsonwebtoken';
import bcrypt from 'bcrypt';
import type { AuthConfig } from '../config/index.js';
import { AppError } from '../utils/errors.js';

export interface JWTPayload {
  sub: string;
  iat: number;
  exp: number;
}

export interface LoginResponse {
  token: string;
  expiresAt: string;
}

export class AuthService {
  constructor(private readonly config: AuthConfig) {}

  isEnabled(): boolean {
    return this.config.enabled && this.config.passwordHash !== '';
  }

  async validateCredentials(username: string, password: string): Promise<boolean> {
    if (!this.isEnabled()) {
      return true; // Auth disabled
    }

    if (username !== this.config.username) {
      return false;
    }

    return bcrypt.compare(password, this.config.passwordHash);
  }

  generateToken(username: string): LoginResponse {
    const now = Math.floor(Date.now() / 1000);
    const exp = now + this.config.tokenExpiry;

    const payload: JWTPayload = {
      sub: username,
      iat: now,
      exp,
    };

    const token = jwt.sign(payload, this.config.secret);
    const expiresAt = new Date(exp * 1000).toISOString();

    return { token, expiresAt };
  }

  verifyToken(token: string): JWTPayload {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.config.secret);
    } catch {
      throw new AppError('Unauthorized', 'Invalid or expired token');
    }

    if (
      typeof decoded === 'string' ||
      typeof decoded.sub !== 'string' ||
      typeof decoded.iat !== 'number' ||
      typeof decoded.exp !== 'number'
    ) {
      throw new AppError('Unauthorized', 'Malformed token');
    }
    return { sub: decoded.sub, iat: decoded.iat, exp: decoded.exp };
  }

  async hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, 10);
  }
}
