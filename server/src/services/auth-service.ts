import bcrypt from 'bcrypt';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { JwtAlgorithm } from '../config';
import { UnauthorizedError } from '../errors';
import type { Logger } from '../logger';
import type { User } from '../models/types';
import type { UserRepository } from '../repositories/types';
import { utcNow } from '../utils/dates';

export const TOKEN_TYPES = ['access', 'refresh'] as const;
export type TokenType = (typeof TOKEN_TYPES)[number];

const TokenPayload = z.object({
  sub: z.string().min(1),
  email: z.string(),
  type: z.enum(TOKEN_TYPES)
});
export type TokenPayload = z.infer<typeof TokenPayload>;

export interface AuthSettings {
  secretKey: string;
  algorithm: JwtAlgorithm;
  accessTokenExpireMinutes: number;
  refreshTokenExpireDays: number;
  bcryptRounds: number;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  tokenType: 'bearer';
}

export class AuthService {
  constructor(
    private readonly users: UserRepository,
    private readonly settings: AuthSettings,
    private readonly logger: Logger,
    private readonly now: () => Date = utcNow
  ) {}

  hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, this.settings.bcryptRounds);
  }

  verifyPassword(password: string, hashed: string): Promise<boolean> {
    return bcrypt.compare(password, hashed);
  }

  createAccessToken(user: Pick<User, 'id' | 'email'>): string {
    return this.sign(user, 'access', this.settings.accessTokenExpireMinutes * 60);
  }

  createRefreshToken(user: Pick<User, 'id' | 'email'>): string {
    return this.sign(user, 'refresh', this.settings.refreshTokenExpireDays * 24 * 60 * 60);
  }

  decodeToken(token: string, expectedType: TokenType): TokenPayload {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.settings.secretKey, {
        algorithms: [this.settings.algorithm]
      });
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) throw new UnauthorizedError('Token has expired');
      if (err instanceof jwt.JsonWebTokenError) throw new UnauthorizedError('Invalid token');
      throw err;
    }

    const payload = TokenPayload.safeParse(decoded);
    if (!payload.success) throw new UnauthorizedError('Invalid token payload');
    if (payload.data.type !== expectedType) throw new UnauthorizedError('Invalid token type');
    return payload.data;
  }

  /** The user for a correct email/password pair, or null. */
  async authenticate(email: string, password: string): Promise<User | null> {
    const user = await this.users.findByEmail(email);
    if (!user || !user.isActive || user.deletedAt) return null;
    const ok = await this.verifyPassword(password, user.hashedPassword);
    return ok ? user : null;
  }

  async login(email: string, password: string): Promise<TokenPair> {
    const user = await this.authenticate(email, password);
    if (!user) {
      this.logger.debug(`Failed login for ${email}`);
      throw new UnauthorizedError('Incorrect email or password');
    }
    await this.users.update(user.id, { lastLoginAt: this.now() });
    this.logger.info(`User ${user.id} logged in`);
    return this.issueTokens(user);
  }

  async refresh(refreshToken: string): Promise<TokenPair> {
    let payload: TokenPayload;
    try {
      payload = this.decodeToken(refreshToken, 'refresh');
    } catch (err) {
      if (err instanceof UnauthorizedError) throw new UnauthorizedError('Invalid refresh token');
      throw err;
    }
    const user = await this.users.findById(payload.sub);
    if (!user || !user.isActive || user.deletedAt) {
      throw new UnauthorizedError('Invalid refresh token');
    }
    return this.issueTokens(user);
  }

  async getCurrentUser(accessToken: string): Promise<User> {
    const payload = this.decodeToken(accessToken, 'access');
    const user = await this.users.findById(payload.sub);
    if (!user) throw new UnauthorizedError('User not found');
    if (!user.isActive || user.deletedAt) throw new UnauthorizedError('Inactive user');
    return user;
  }

  issueTokens(user: Pick<User, 'id' | 'email'>): TokenPair {
    return {
      accessToken: this.createAccessToken(user),
      refreshToken: this.createRefreshToken(user),
      tokenType: 'bearer'
    };
  }

  private sign(user: Pick<User, 'id' | 'email'>, type: TokenType, expiresInSeconds: number): string {
    const payload: TokenPayload = { sub: user.id, email: user.email, type };
    return jwt.sign(payload, this.settings.secretKey, {
      algorithm: this.settings.algorithm,
      expiresIn: expiresInSeconds
    });
  }
}
