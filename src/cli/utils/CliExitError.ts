/**
 * An error that ends the program with a specific exit code.
 */
export class CliExitError extends Error {
  exitCode: number

  constructor(message: string, exitCode: number) {
    super(message)
    this.name = 'CliExitError'
    this.exitCode = exitCode
  }
}
