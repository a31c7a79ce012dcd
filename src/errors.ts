/** Bad configuration or command-line input. The CLI exits non-zero on these. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
