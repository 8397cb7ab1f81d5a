import type { RegisterUserInput, RegisterUsersResult, UserInfo } from '@dataset-lookup/shared';
import type { AdminMetadataStore } from '../stores/admin-metadata.store.js';
import { forbidden, notFound } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('UserService');

export class UserService {
  constructor(private readonly adminStore: AdminMetadataStore) {}

  /**
   * Register users in bulk. Already registered usernames are skipped and
   * keep their admin status; use {@link UserService.setIsAdmin} to change it.
   */
  async registerUsers(users: RegisterUserInput[]): Promise<RegisterUsersResult> {
    logger.info({ count: users.length }, 'Registering users');

    const result = await this.adminStore.registerUsers(users);
    if (result.skipped.length > 0) {
      logger.warn({ skipped: result.skipped }, 'Skipped users that are already registered');
    }
    return result;
  }

  async listUsers(): Promise<UserInfo[]> {
    return this.adminStore.listUsers();
  }

  async isAdmin(username: string): Promise<boolean> {
    const user = await this.adminStore.getUser(username);
    return user.is_admin;
  }

  // Users may read their own record; admins may read anyone's.
  async getUserInfo(requester: string, username: string): Promise<UserInfo> {
    const caller = await this.adminStore.getUser(requester);
    if (requester !== username && !caller.is_admin) {
      throw forbidden('Admin privileges required to view other users');
    }
    if (requester === username) return caller;

    // The caller is authenticated; an unknown target is a missing resource
    if (!(await this.adminStore.userExists(username))) {
      throw notFound(`User not registered: ${username}`);
    }
    return this.adminStore.getUser(username);
  }

  async setIsAdmin(username: string, isAdmin: boolean): Promise<void> {
    logger.info({ username, isAdmin }, 'Updating admin status');
    await this.adminStore.setUserIsAdmin(username, isAdmin);
  }
}
