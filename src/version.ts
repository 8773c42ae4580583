// Version reported by `toad --version` and the default User-Agent

export const VERSION = '0.3.0';
