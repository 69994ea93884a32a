/**
 * Console logging in the shape GitHub Actions understands.
 * `notice` and `error` become workflow annotations; `info` is a plain line.
 */

export function info(message: string): void {
  console.log(message);
}

export function notice(message: string): void {
  console.log(`::notice::${message}`);
}

export function error(message: string): void {
  console.error(`::error::${message}`);
}
