import type { SiteProfile } from './types.js';

/**
 * Typed helper for site profile definitions.
 * Keeps selector tables consistent without runtime overhead.
 */
export function defineSiteProfile<T extends SiteProfile>(profile: T): T {
  return profile;
}
