// Keep in sync with package.json
export const VERSION = '0.4.0';
