/**
 * Output formatting utilities for the CLI
 */

import chalk from 'chalk'

export function heading(text: string): void {
  console.log(chalk.bold.cyan(`\n${text}`))
  console.log(chalk.dim('─'.repeat(Math.min(text.length + 4, 60))))
}

export function field(label: string, value: string | number): void {
  console.log(`  ${chalk.gray(label.padEnd(24))} ${value}`)
}

export function success(text: string): void {
  console.log(chalk.green(`✓ ${text}`))
}

export function error(text: string): void {
  console.error(chalk.red(`✗ ${text}`))
}

export function warn(text: string): void {
  console.log(chalk.yellow(`! ${text}`))
}
