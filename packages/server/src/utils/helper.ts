import path from 'path';
import { ALLOWED_EXTENSIONS, LinkMode, isLinkMode } from '@metadata-writer/shared';

/**
 * Surrounding whitespace is ignored. Unknown or missing link modes fall back
 * to "checked, no links".
 */
export function parseLinkMode(value: unknown): LinkMode {
  const mode = typeof value === 'string' ? value.trim() : value;
  return isLinkMode(mode) ? mode : LinkMode.CHECKED_NO_LINKS;
}

export function isAllowedMedia(filename: string): boolean {
  const ext = path.extname(filename).toLowerCase();
  return ALLOWED_EXTENSIONS.some((allowed) => allowed === ext);
}
