import crypto from 'crypto';

export class TextProcessor {
  /**
   * sha256 of the exact content, hex encoded
   */
  static generateContentHash(content: string): string {
    return crypto.createHash('sha256').update(content, 'utf8').digest('hex');
  }

  /**
   * Filesystem-safe slug: keeps letters, digits, space, `_` and `-`.
   */
  static slugify(text: string, maxLength: number = 50): string {
    const sanitized = Array.from(text)
      .map((char) => (/[\p{L}\p{N} _-]/u.test(char) ? char : '_'))
      .join('')
      .replace(/ /g, '_')
      .slice(0, maxLength);
    return sanitized.replace(/_+$/, '');
  }

  static truncate(text: string, maxLength: number): string {
    if (text.length <= maxLength) return text;
    return text.substring(0, maxLength - 3) + '...';
  }
}
