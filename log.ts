let debugEnabled = false;

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

export const log = {
  info(message: string, ...rest: unknown[]): void {
    console.log(message, ...rest);
  },
  warn(message: string, ...rest: unknown[]): void {
    console.warn(`⚠️  ${message}`, ...rest);
  },
  error(message: string, ...rest: unknown[]): void {
    console.error(`❌ ${message}`, ...rest);
  },
  debug(message: string, ...rest: unknown[]): void {
    if (debugEnabled) console.debug(`🐛 ${message}`, ...rest);
  },
};
