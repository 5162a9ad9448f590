/**
 * Input validation for names that come from untrusted archives
 */

import path from 'path';

/**
 * Validate an archive member name before it is joined onto an extraction
 * directory. Absolute paths, drive letters, `..` segments and null bytes
 * would let a crafted archive write outside that directory.
 */
export function validateMemberPath(memberName: string): { valid: boolean; error?: string } {
  if (!memberName || typeof memberName !== 'string') {
    return { valid: false, error: 'Member name must be a non-empty string' };
  }

  if (memberName.includes('\0')) {
    return { valid: false, error: 'Member name contains null bytes' };
  }

  const normalized = memberName.replace(/\\/g, '/');
  if (normalized.startsWith('/') || /^[a-zA-Z]:/.test(normalized)) {
    return { valid: false, error: 'Absolute member paths not allowed' };
  }

  if (normalized.split('/').includes('..')) {
    return { valid: false, error: 'Directory traversal not allowed' };
  }

  return { valid: true };
}

/**
 * Resolve a validated member name under `root`, refusing anything that still
 * lands outside it after normalization.
 */
export function resolveInside(root: string, memberName: string): string | undefined {
  const base = path.resolve(root);
  const target = path.resolve(base, memberName.replace(/\\/g, '/'));
  if (target === base || !target.startsWith(base + path.sep)) return undefined;
  return target;
}

/**
 * Sanitize string for safe logging (remove control characters, limit length)
 */
export function sanitizeForLog(input: string, maxLength: number = 1000): string {
  // Remove control characters except newline and tab
  let sanitized = input.replace(/[\x00-\x08\x0B-\x0C\x0E-\x1F\x7F]/g, '');

  if (sanitized.length > maxLength) {
    sanitized = sanitized.slice(0, maxLength) + '... (truncated)';
  }

  return sanitized;
}
