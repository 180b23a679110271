/**
 * Package version, kept in step with package.json.
 */
export const VERSION = '1.1.0';
