/**
 * log.ts
 *
 * Console logging with a timestamp prefix: `<ISO time> - <message>`
 */

function line(message: string): string {
  return `${new Date().toISOString()} - ${message}`;
}

export const log = {
  info(message: string) {
    console.log(line(message));
  },
  warn(message: string) {
    console.warn(line(message));
  },
  error(message: string) {
    console.error(line(message));
  },
};
