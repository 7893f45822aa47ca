/** Package version, reported by `pathpick --version` */
export const VERSION = "0.1.0";
