/**
 * Package version reported by the CLI
 */
export const version = '0.1.0';
