// ═══════════════════════════════════════════════════════════════
//  Console logging for generation runs
// ═══════════════════════════════════════════════════════════════

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(`⚠️  Warning: ${message}`),
};

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
};

/** Three-line `═` banner around a title. */
export function logBanner(logger: Logger, title: string): void {
  logger.info(`\n${'═'.repeat(63)}`);
  logger.info(`  ${title}`);
  logger.info(`${'═'.repeat(63)}\n`);
}
