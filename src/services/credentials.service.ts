import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { AppError, UnauthorizedError } from '../utils/errors.js';

const TOKEN_ALGORITHM = 'HS256';

export interface AuthUser {
    id: string;
    email: string;
}

export interface CredentialOptions {
    secret: string;
    expiresIn: number; // seconds
    saltRounds: number;
}

export class CredentialService {
    constructor(private options: CredentialOptions) {}

    async hashPassword(password: string): Promise<string> {
        return await bcrypt.hash(password, this.options.saltRounds);
    }

    async verifyPassword(password: string, hashedPassword: string): Promise<boolean> {
        return await bcrypt.compare(password, hashedPassword);
    }

    issueToken(user: AuthUser): string {
        return jwt.sign({ email: user.email }, this.options.secret, {
            subject: user.id,
            expiresIn: this.options.expiresIn,
            algorithm: TOKEN_ALGORITHM
        });
    }

    // fails closed: any verification problem is an UnauthorizedError
    verifyToken(token: string): AuthUser {
        try {
            const payload = jwt.verify(token, this.options.secret, {
                algorithms: [TOKEN_ALGORITHM]
            });

            if (typeof payload === 'string' || !payload.sub || typeof payload.email !== 'string') {
                throw new UnauthorizedError('Could not validate credentials');
            }

            return { id: payload.sub, email: payload.email };
        } catch (err) {
            if (err instanceof AppError) throw err;
            throw new UnauthorizedError('Could not validate credentials');
        }
    }
}
