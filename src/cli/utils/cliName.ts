import {readFileSync} from 'node:fs'
import {fileURLToPath} from 'node:url'

interface PackageJson {
  version?: string
  bin?: Record<string, string>
}

function readPackageJson(): PackageJson {
  const packageJsonUrl = new URL('../../../package.json', import.meta.url)
  const text = readFileSync(fileURLToPath(packageJsonUrl), 'utf8')
  return JSON.parse(text) as PackageJson
}

export function getCliName(): string {
  const bin = readPackageJson().bin
  const firstKey = bin ? Object.keys(bin)[0] : undefined
  if (!firstKey) {
    throw new Error('Unable to determine CLI name from package.json `bin` field')
  }

  return firstKey
}

export function getCliVersion(): string {
  return readPackageJson().version ?? '0.0.0'
}
