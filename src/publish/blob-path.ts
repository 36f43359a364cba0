const pad = (value: number, width: number = 2): string => String(value).padStart(width, '0');

/**
 * Expand a blob prefix template for a given instant, in UTC.
 *
 * Supported directives: %Y (year), %m (month), %d (day), %H (hour), %M (minute),
 * %S (second), %% (a literal '%'). Unknown directives are left untouched.
 * The result always ends with '/'.
 *
 * @example formatBlobPath('sales/%Y/%m/%d', new Date('2024-03-05T10:00:00Z')) // 'sales/2024/03/05/'
 */
export function formatBlobPath(template: string, date: Date): string {
  const expanded = template.replace(/%([YmdHMS%])/g, (_match, directive: string) => {
    switch (directive) {
      case 'Y':
        return pad(date.getUTCFullYear(), 4);
      case 'm':
        return pad(date.getUTCMonth() + 1);
      case 'd':
        return pad(date.getUTCDate());
      case 'H':
        return pad(date.getUTCHours());
      case 'M':
        return pad(date.getUTCMinutes());
      case 'S':
        return pad(date.getUTCSeconds());
      default:
        return '%';
    }
  });

  return expanded.endsWith('/') ? expanded : `${expanded}/`;
}
