import chalk from 'chalk';
import { MgcService } from './mgc.js';
import { AuthRequiredError, getErrorMessage } from '../types/errors.js';

export interface EnsureAuthOptions {
  allowInteractive: boolean;
  forceRefresh?: boolean;
  // Waybar モードでは stdout を JSON 専用にする
  stdoutToStderr?: boolean;
}

/**
 * Graph のセッションを管理する。トークンのキャッシュ自体は mgc が持つ
 */
export class AuthService {
  constructor(
    private readonly mgc: MgcService,
    private readonly scopes: string
  ) {}

  /**
   * 有効なセッションを保証する
   * 対話ログインが許可されていなければ AuthRequiredError を投げる
   */
  async ensureAuthenticated(options: EnsureAuthOptions): Promise<void> {
    const { allowInteractive, forceRefresh = false, stdoutToStderr = false } = options;

    if (!forceRefresh && await this.mgc.checkAuth()) {
      return;
    }

    if (!allowInteractive) {
      throw new AuthRequiredError();
    }

    if (forceRefresh) {
      // 古いトークンを捨ててから取り直す
      try {
        await this.mgc.logout({ stdoutToStderr });
      } catch (error) {
        console.error(chalk.yellow(`Warning: failed to clear cached session: ${getErrorMessage(error)}`));
      }
    }

    await this.mgc.login(this.scopes, { stdoutToStderr });

    if (!await this.mgc.checkAuth()) {
      throw new AuthRequiredError('Authentication did not complete');
    }
  }

  async isAuthenticated(): Promise<boolean> {
    return this.mgc.checkAuth();
  }

  async login(options: { stdoutToStderr?: boolean } = {}): Promise<void> {
    await this.mgc.login(this.scopes, options);
  }

  async logout(): Promise<void> {
    await this.mgc.logout();
  }
}
