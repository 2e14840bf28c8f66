import { v4 as uuidv4 } from 'uuid';
import { appConfig, authConfig, cacheConfig } from '../../connections/config/app.config';
import type { CreateAuthTokenInput, StoredTokenPurpose } from '../../connections/db/models/auth-token.model';
import type { User } from '../../connections/db/models/user.model';
import type { AuthUser } from '../../types/request.types';
import { authUserSchema } from '../../types/request.types';
import type { TokenPairResponse, UserResponse } from '../../types/response.types';
import { runBestEffort } from '../../utils/best-effort';
import type { CacheService } from '../../utils/cache.service';
import { cacheKeys } from '../../utils/cache.service';
import type { NotificationSender } from '../../utils/email.service';
import {
  ConflictError,
  InvalidCredentialsError,
  NotVerifiedError,
  TokenError,
  UnauthorizedError,
} from '../../utils/errors';
import { auditLog, logger } from '../../utils/logging';
import { toAuthUser, toUserResponse } from './auth.mappers';
import type { UserRepository } from './auth.repository';
import type { PasswordHasher } from './password.service';
import type { IssuedToken, TokenService } from './token.service';

export interface AuthSettings {
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  verificationTokenTtlSeconds: number;
  resetPasswordTokenTtlSeconds: number;
  userCacheTtlSeconds: number;
  /** Link target for verification emails, `?token=` is appended */
  verificationUrl: string;
  /** Frontend page that collects the new password, `?token=` is appended */
  resetPasswordUrl: string;
}

export const authSettingsFromConfig = (): AuthSettings => ({
  accessTokenTtlSeconds: authConfig.accessTokenTtlSeconds,
  refreshTokenTtlSeconds: authConfig.refreshTokenTtlSeconds,
  verificationTokenTtlSeconds: authConfig.verificationTokenTtlSeconds,
  resetPasswordTokenTtlSeconds: authConfig.resetPasswordTokenTtlSeconds,
  userCacheTtlSeconds: cacheConfig.userTtlSeconds,
  verificationUrl: `${appConfig.baseUrl}/auth/verify-email`,
  resetPasswordUrl: `${appConfig.frontendUrl}/reset-password`,
});

export interface AuthServiceDeps {
  users: UserRepository;
  tokens: TokenService;
  passwords: PasswordHasher;
  notifications: NotificationSender;
  cache: CacheService;
  settings: AuthSettings;
}

export interface SignupInput {
  email: string;
  password: string;
  name: string;
}

const withToken = (url: string, token: string): string =>
  `${url}${url.includes('?') ? '&' : '?'}token=${encodeURIComponent(token)}`;

const toRecord = (userId: string, purpose: StoredTokenPurpose, issued: IssuedToken): CreateAuthTokenInput => ({
  id: issued.jti,
  user_id: userId,
  purpose,
  expires_at: issued.expiresAt,
});

/**
 * Account lifecycle: Unverified --verify--> Active, with login, refresh
 * rotation, logout and password reset on active accounts. Also resolves
 * access tokens to users for the auth middleware.
 */
export class AuthService {
  private readonly users: UserRepository;
  private readonly tokens: TokenService;
  private readonly passwords: PasswordHasher;
  private readonly notifications: NotificationSender;
  private readonly cache: CacheService;
  private readonly settings: AuthSettings;
  private dummyHash?: Promise<string>;

  constructor(deps: AuthServiceDeps) {
    this.users = deps.users;
    this.tokens = deps.tokens;
    this.passwords = deps.passwords;
    this.notifications = deps.notifications;
    this.cache = deps.cache;
    this.settings = deps.settings;
  }

  async signup(input: SignupInput): Promise<UserResponse> {
    const existing = await this.users.findByEmail(input.email);
    if (existing) {
      throw new ConflictError('User with this email already exists', 'EMAIL_TAKEN');
    }

    const passwordHash = await this.passwords.hash(input.password);
    const userId = uuidv4();
    const verification = this.tokens.issue(userId, 'verify-email', this.settings.verificationTokenTtlSeconds);

    const user = await this.users.createWithToken(
      { id: userId, email: input.email, password_hash: passwordHash, name: input.name },
      { id: verification.jti, purpose: 'verify-email', expires_at: verification.expiresAt }
    );

    this.dispatchVerification(user, verification.token);
    auditLog('USER_SIGNED_UP', { userId: user.id, email: user.email });

    return toUserResponse(toAuthUser(user));
  }

  /**
   * Unknown emails succeed silently so the endpoint cannot be used to probe accounts
   */
  async resendVerification(email: string): Promise<void> {
    const user = await this.users.findByEmail(email);
    if (!user) {
      logger.info('[Auth] Verification resend for unknown email ignored');
      return;
    }
    if (user.is_verified) {
      throw new ConflictError('Email already confirmed', 'ALREADY_VERIFIED');
    }

    const verification = this.tokens.issue(user.id, 'verify-email', this.settings.verificationTokenTtlSeconds);
    await this.users.replaceToken(toRecord(user.id, 'verify-email', verification));
    this.dispatchVerification(user, verification.token);
  }

  async verifyEmail(token: string): Promise<UserResponse> {
    const claims = this.tokens.validate(token, 'verify-email');

    const user = await this.users.verifyEmailWithToken(claims.jti, claims.sub);
    if (!user) {
      throw new TokenError('invalid');
    }

    await this.cache.bumpGeneration(cacheKeys.userGeneration(user.id));
    auditLog('EMAIL_VERIFIED', { userId: user.id });

    return toUserResponse(toAuthUser(user));
  }

  async login(email: string, password: string): Promise<TokenPairResponse> {
    const user = await this.users.findByEmail(email);
    if (!user) {
      // keep the response time of unknown emails close to a real comparison
      await this.passwords.verify(password, await this.getDummyHash());
      throw new InvalidCredentialsError();
    }

    const valid = await this.passwords.verify(password, user.password_hash);
    if (!valid) {
      auditLog('LOGIN_FAILED', { userId: user.id });
      throw new InvalidCredentialsError();
    }

    if (!user.is_verified) {
      throw new NotVerifiedError();
    }

    const { pair, refreshRecord } = this.issuePair(user);
    await this.users.saveToken(refreshRecord);

    auditLog('USER_LOGGED_IN', { userId: user.id });
    return pair;
  }

  /**
   * Rotates the refresh token. Presenting a token that was already rotated or
   * revoked kills every refresh token of the user.
   */
  async refresh(refreshToken: string): Promise<TokenPairResponse> {
    const claims = this.tokens.validate(refreshToken, 'refresh');

    const user = await this.users.findById(claims.sub);
    if (!user || !user.is_verified) {
      throw new TokenError('invalid');
    }

    const { pair, refreshRecord } = this.issuePair(user);
    const rotated = await this.users.rotateRefreshToken(claims.jti, refreshRecord);
    if (!rotated) {
      const revoked = await this.users.revokeTokens(user.id, 'refresh');
      auditLog('REFRESH_TOKEN_REUSED', { userId: user.id, jti: claims.jti, revoked });
      throw new TokenError('revoked');
    }

    await this.cache.bumpGeneration(cacheKeys.userGeneration(user.id));
    return pair;
  }

  async logout(refreshToken: string): Promise<void> {
    const claims = this.tokens.validate(refreshToken, 'refresh');
    const revoked = await this.users.revokeToken(claims.jti, 'refresh');
    if (revoked) {
      auditLog('USER_LOGGED_OUT', { userId: claims.sub });
    }
  }

  async requestPasswordReset(email: string): Promise<void> {
    const user = await this.users.findByEmail(email);
    if (!user) {
      logger.info('[Auth] Password reset for unknown email ignored');
      return;
    }

    const reset = this.tokens.issue(user.id, 'reset-password', this.settings.resetPasswordTokenTtlSeconds);
    await this.users.replaceToken(toRecord(user.id, 'reset-password', reset));

    const link = withToken(this.settings.resetPasswordUrl, reset.token);
    void runBestEffort({
      operation: 'send-password-reset-email',
      run: () => this.notifications.sendPasswordResetEmail({ to: user.email, name: user.name, link }),
      context: { userId: user.id },
    });
    auditLog('PASSWORD_RESET_REQUESTED', { userId: user.id });
  }

  async confirmPasswordReset(token: string, newPassword: string): Promise<void> {
    const claims = this.tokens.validate(token, 'reset-password');

    const passwordHash = await this.passwords.hash(newPassword);
    const user = await this.users.resetPasswordWithToken(claims.jti, claims.sub, passwordHash);
    if (!user) {
      throw new TokenError('invalid');
    }

    await this.cache.bumpGeneration(cacheKeys.userGeneration(user.id));
    auditLog('PASSWORD_RESET', { userId: user.id });
  }

  /**
   * Resolve a bearer access token to the current user, cache first.
   * Snapshots live under the user's cache generation, which every credential
   * or profile change bumps.
   */
  async authenticate(accessToken: string): Promise<AuthUser> {
    const claims = this.tokens.validate(accessToken, 'access');

    // read before the store so a snapshot taken ahead of a bump lands on a dead key
    const generation = await this.cache.getGeneration(cacheKeys.userGeneration(claims.sub));
    const key = generation === null ? null : cacheKeys.user(claims.sub, generation);

    const cached = key === null ? null : await this.cache.get(key, authUserSchema);
    if (cached && cached.is_verified && cached.token_version === claims.ver) {
      return cached;
    }

    const row = await this.users.findById(claims.sub);
    if (!row || !row.is_verified) {
      throw new UnauthorizedError();
    }
    const user = toAuthUser(row);
    if (claims.ver !== user.token_version) {
      throw new TokenError('revoked');
    }

    if (key !== null) {
      const ttl = Math.min(this.userCacheTtl(), claims.exp - this.tokens.nowSeconds());
      if (ttl > 0) {
        await this.cache.set(key, user, ttl);
      }
    }

    return user;
  }

  private issuePair(user: User): { pair: TokenPairResponse; refreshRecord: CreateAuthTokenInput } {
    const access = this.tokens.issue(user.id, 'access', this.settings.accessTokenTtlSeconds, {
      ver: user.token_version,
    });
    const refresh = this.tokens.issue(user.id, 'refresh', this.settings.refreshTokenTtlSeconds);

    return {
      pair: {
        access_token: access.token,
        refresh_token: refresh.token,
        token_type: 'bearer',
        expires_in: this.settings.accessTokenTtlSeconds,
      },
      refreshRecord: toRecord(user.id, 'refresh', refresh),
    };
  }

  private dispatchVerification(user: User, token: string): void {
    const link = withToken(this.settings.verificationUrl, token);
    void runBestEffort({
      operation: 'send-verification-email',
      run: () => this.notifications.sendVerificationEmail({ to: user.email, name: user.name, link }),
      context: { userId: user.id },
    });
  }

  private userCacheTtl(): number {
    return Math.min(this.settings.userCacheTtlSeconds, this.settings.accessTokenTtlSeconds);
  }

  private getDummyHash(): Promise<string> {
    this.dummyHash ??= this.passwords.hash('timing-equalizer');
    return this.dummyHash;
  }
}
