import { FastifyInstance } from 'fastify';
import { AuthController, type LoginBody, type RegisterBody } from '../controllers/auth.controller.js';
import type { Services } from '../types/stores.js';
import { loginSchema, registerSchema } from './schemas/auth.schema.js';

export async function authRoutes(app: FastifyInstance, { documents, credentials }: Services) {
    const authController = new AuthController(documents, credentials);

    // public
    app.post<{ Body: RegisterBody }>('/auth/register',
        { schema: registerSchema },
        authController.register.bind(authController)
    );

    app.post<{ Body: LoginBody }>('/auth/login',
        { schema: loginSchema },
        authController.login.bind(authController)
    );
}
