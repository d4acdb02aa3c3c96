import { chalk } from 'zx';

export function info(message: string): void {
  console.log(chalk.blue(`→ ${message}`));
}

export function success(message: string): void {
  console.log(chalk.green(`✓ ${message}`));
}

export function detail(message: string): void {
  console.log(chalk.gray(`  ${message}`));
}

export function warn(message: string): void {
  console.error(chalk.yellow(`⚠ ${message}`));
}

export function error(message: string, cause?: unknown): void {
  console.error(chalk.red(`✗ ${message}`));
  if (cause !== undefined) {
    console.error(chalk.gray(`  ${cause instanceof Error ? cause.message : String(cause)}`));
  }
}

export function fatal(message: string): void {
  console.error(chalk.bold.red(`\n❌ ${message}\n`));
}
