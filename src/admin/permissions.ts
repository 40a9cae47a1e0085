import type { AppConfig } from '../config/index.js';

/** Users allowed to force the inactivity sweep with /cleanup. */
export function isSweepAdmin(config: Pick<AppConfig, 'adminUserIds'>, userId: string): boolean {
  return config.adminUserIds.has(userId);
}
