/**
 * ANSI color helpers for CLI output.
 * Colors are off when stdout is not a TTY or NO_COLOR is set.
 */

const enabled = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR

function paint(open: number, close: number) {
  return (s: string) => (enabled ? `\x1b[${open}m${s}\x1b[${close}m` : s)
}

export const dim = paint(2, 22)

export const red = paint(31, 39)
export const green = paint(32, 39)
export const yellow = paint(33, 39)
export const blue = paint(34, 39)
export const magenta = paint(35, 39)
export const cyan = paint(36, 39)
