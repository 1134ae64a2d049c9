import crypto from 'crypto';
import { FastifyReply, FastifyRequest } from 'fastify';
import type { CredentialService } from '../services/credentials.service.js';
import { toPublicUser, type User } from '../types/models.js';
import type { DocumentStore } from '../types/stores.js';
import { ConflictError, UnauthorizedError } from '../utils/errors.js';

export interface RegisterBody {
    username: string;
    email: string;
    password: string;
}

export interface LoginBody {
    email: string;
    password: string;
}

export class AuthController {
    constructor(
        private documents: DocumentStore,
        private credentials: CredentialService
    ) {}

    private session(user: User) {
        const token = this.credentials.issueToken({ id: user.id, email: user.email });
        return { token, user: toPublicUser(user) };
    }

    // POST /auth/register
    async register(request: FastifyRequest<{ Body: RegisterBody }>, reply: FastifyReply) {
        const { username, email, password } = request.body;
        request.log.info({ email }, 'Registration attempt');

        try {
            const existing = await this.documents.getUserByEmail(email);
            if (existing) {
                request.log.warn({ email }, 'Registration failed: email already exists');
                throw new ConflictError('User with this email already exists');
            }

            const newUser = await this.documents.createUser({
                id: crypto.randomUUID(),
                username,
                email,
                hashedPassword: await this.credentials.hashPassword(password),
                createdAt: new Date().toISOString()
            });
            request.log.info({ userId: newUser.id }, 'User created');

            return reply.status(200).send(this.session(newUser));
        } catch (err) {
            return reply.sendError(err, 'Failed to register user');
        }
    }

    // POST /auth/login
    // unknown email and wrong password answer identically
    async login(request: FastifyRequest<{ Body: LoginBody }>, reply: FastifyReply) {
        const { email, password } = request.body;
        request.log.info({ email }, 'Login attempt');

        try {
            const user = await this.documents.getUserByEmail(email);
            const valid = user !== null && await this.credentials.verifyPassword(password, user.hashedPassword);

            if (!user || !valid) {
                request.log.warn({ email }, 'Login failed');
                throw new UnauthorizedError('Invalid email or password');
            }

            request.log.info({ userId: user.id }, 'Login successful');
            return reply.status(200).send(this.session(user));
        } catch (err) {
            return reply.sendError(err, 'Failed to login');
        }
    }
}
