import { describe, it } from 'mocha';
import { expect } from 'chai';
import jwt from 'jsonwebtoken';
import { CredentialService } from '../src/services/credentials.service.js';
import { UnauthorizedError } from '../src/utils/errors.js';

describe('CREDENTIAL SERVICE TESTS:', () => {
    const secret = 'test-secret';
    const credentials = new CredentialService({ secret, expiresIn: 60, saltRounds: 4 });
    const user = { id: 'user-1', email: 'user@example.com' };

    describe('passwords', () => {
        it('should verify the password it hashed', async () => {
            const hashed = await credentials.hashPassword('correct-horse-1');

            expect(hashed).to.not.equal('correct-horse-1');
            expect(await credentials.verifyPassword('correct-horse-1', hashed)).to.equal(true);
            expect(await credentials.verifyPassword('wrong-horse-1', hashed)).to.equal(false);
        });

        it('should salt every hash', async () => {
            const first = await credentials.hashPassword('same-password');
            const second = await credentials.hashPassword('same-password');
            expect(first).to.not.equal(second);
        });
    });

    describe('tokens', () => {
        it('should verify the token it issued', () => {
            const token = credentials.issueToken(user);
            expect(credentials.verifyToken(token)).to.deep.equal(user);
        });

        it('should carry the user id as subject with the configured lifetime', () => {
            const payload = jwt.decode(credentials.issueToken(user));

            expect(payload).to.be.an('object');
            if (payload === null || typeof payload === 'string') return;
            expect(payload.sub).to.equal('user-1');
            expect(payload.email).to.equal('user@example.com');
            expect(Number(payload.exp) - Number(payload.iat)).to.equal(60);
        });

        it('should reject a token signed with another secret', () => {
            const other = new CredentialService({ secret: 'other-secret', expiresIn: 60, saltRounds: 4 });
            const token = other.issueToken(user);

            expect(() => credentials.verifyToken(token)).to.throw(UnauthorizedError, 'Could not validate credentials');
        });

        it('should reject an expired token', () => {
            const token = jwt.sign(
                { email: user.email, exp: Math.floor(Date.now() / 1000) - 60 },
                secret,
                { subject: user.id }
            );

            expect(() => credentials.verifyToken(token)).to.throw(UnauthorizedError, 'Could not validate credentials');
        });

        it('should reject a token signed with another algorithm', () => {
            const token = jwt.sign({ email: user.email }, secret, { subject: user.id, algorithm: 'HS512' });

            expect(() => credentials.verifyToken(token)).to.throw(UnauthorizedError, 'Could not validate credentials');
        });

        it('should reject a token without the expected claims', () => {
            const noSubject = jwt.sign({ email: user.email }, secret);
            const noEmail = jwt.sign({}, secret, { subject: user.id });

            expect(() => credentials.verifyToken(noSubject)).to.throw(UnauthorizedError);
            expect(() => credentials.verifyToken(noEmail)).to.throw(UnauthorizedError);
        });

        it('should reject garbage', () => {
            expect(() => credentials.verifyToken('not.a.token')).to.throw(UnauthorizedError);
        });
    });
});
