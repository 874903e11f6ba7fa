/**
 * Version information for the logrelay CLI
 */

// Keep in sync with package.json
export const VERSION = "0.1.0";
