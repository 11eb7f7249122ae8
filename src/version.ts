/** Package version, reported by `scanlet --version` */
export const VERSION = '0.1.0';
