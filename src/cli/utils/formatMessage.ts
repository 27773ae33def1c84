import {green, yellow} from './colors.ts'

/**
 * Format a success message with a green checkmark
 */
export function formatSuccess(message: string): string {
  return `${green('✓')} ${message}`
}

/**
 * Format a warning message with a yellow warning icon
 */
export function formatWarning(message: string): string {
  return `${yellow('⚠️')}  ${message}`
}
