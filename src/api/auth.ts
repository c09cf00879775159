import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { AppServices } from '../server/services.js';
import { AppError } from '../utils/errors.js';

interface LoginBody {
  username: string;
  password: string;
}

export async function authRoutes(app: FastifyInstance, services: Pick<AppServices, 'auth'>) {
  const { auth } = services;

  // Login endpoint
  app.post<{ Body: LoginBody }>('/api/auth/login', {
    schema: {
      body: {
        type: 'object',
        required: ['username', 'password'],
        properties: {
          username: { type: 'string', minLength: 1 },
          password: { type: 'string', minLength: 1 },
        },
      },
    },
  }, async (request) => {
    const { username, password } = request.body;

    const valid = await auth.validateCredentials(username, password);
    if (!valid) {
      throw new AppError('Unauthorized', 'Invalid credentials');
    }

    return auth.generateToken(username);
  });

  // Token refresh endpoint
  app.post('/api/auth/refresh', async (request: FastifyRequest) => {
    const authHeader = request.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      throw new AppError('Unauthorized', 'Missing authorization header');
    }

    const payload = auth.verifyToken(authHeader.substring(7));
    return auth.generateToken(payload.sub);
  });

  // Check auth status
  app.get('/api/auth/status', async (request: FastifyRequest) => {
    return {
      enabled: auth.isEnabled(),
      user: request.user?.sub ?? null,
    };
  });
}
