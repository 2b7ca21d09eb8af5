import type { ClassName } from '../models/class-name.js';

/**
 * Matches placeholders such as "{baseUrl}", "{full}" or "{full -}".
 */
const placeholderRegex = /\{(.*?)(\s+(.*?))?\}/g;

export interface UrlPatternContext {
  baseUrl?: string;
  className: ClassName;
}

/**
 * Build a class URL from an archive's javadocUrlPattern.
 *
 * Supported fields: "baseUrl" (the archive's base URL) and "full" (the
 * fully-qualified class name, with every "." replaced by the optional
 * delimiter). Unknown fields are replaced with an empty string.
 */
export function applyUrlPattern(pattern: string, context: UrlPatternContext): string {
  return pattern.replace(placeholderRegex, (_match, field: string, _delimiterGroup: string | undefined, delimiter: string | undefined) => {
    switch (field) {
      case 'baseUrl':
        return context.baseUrl ?? '';
      case 'full': {
        const fullName = context.className.fullyQualifiedName;
        return delimiter === undefined ? fullName : fullName.split('.').join(delimiter);
      }
      default:
        return '';
    }
  });
}
