import pc from 'picocolors';

/**
 * Print the startup banner
 */
export function printBanner(version: string): void {
  console.log();
  console.log(pc.cyan(pc.bold('  Entitlements')));
  console.log(pc.dim(`  v${version}`));
  console.log();
}

/**
 * Print lines of command output
 */
export function printLines(lines: readonly string[]): void {
  for (const line of lines) {
    console.log(`  ${line}`);
  }
}

/**
 * Print a success message
 */
export function printSuccess(message: string): void {
  console.log(pc.green(`  ✓ ${message}`));
}

/**
 * Print an error message
 */
export function printError(message: string): void {
  console.log(pc.red(`  ✗ ${message}`));
}

/**
 * Print a warning message
 */
export function printWarning(message: string): void {
  console.log(pc.yellow(`  ! ${message}`));
}

/**
 * Print an info message
 */
export function printInfo(message: string): void {
  console.log(pc.dim(`  ${message}`));
}
