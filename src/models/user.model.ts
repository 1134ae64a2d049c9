import type pg from 'pg';
import type { User } from '../types/models.js';
import { ConflictError } from '../utils/errors.js';

export type UserRow = {
    id: string;
    username: string;
    email: string;
    hashed_password: string;
    created_at: Date;
};

const UNIQUE_VIOLATION = '23505';

export function toUser(row: UserRow): User {
    return {
        id: row.id,
        username: row.username,
        email: row.email,
        hashedPassword: row.hashed_password,
        createdAt: row.created_at.toISOString()
    };
}

function isUniqueViolation(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === UNIQUE_VIOLATION;
}

export class UserModel {
    constructor(private db: pg.Pool) {}

    async findByEmail(email: string): Promise<User | null> {
        const result = await this.db.query<UserRow>(
            'SELECT id, username, email, hashed_password, created_at FROM users WHERE email = $1',
            [email]
        );
        return result.rows.length > 0 ? toUser(result.rows[0]) : null;
    }

    async create(user: User): Promise<User> {
        const query = `
            INSERT INTO users (id, username, email, hashed_password, created_at)
            VALUES ($1, $2, $3, $4, $5)
            RETURNING id, username, email, hashed_password, created_at
        `;
        const values = [user.id, user.username, user.email, user.hashedPassword, user.createdAt];

        try {
            const result = await this.db.query<UserRow>(query, values);
            if (result.rows.length === 0) {
                throw new Error('User INSERT failed');
            }
            return toUser(result.rows[0]);
        } catch (err) {
            // lost a race with a concurrent registration for the same email
            if (isUniqueViolation(err)) {
                throw new ConflictError('User with this email already exists');
            }
            throw err;
        }
    }
}
