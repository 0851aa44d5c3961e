/**
 * Tapline — Argument Helpers
 *
 * Plain argv scanning. A flag's value is the next argument, and
 * anything starting with `--` is another flag, not a value.
 */

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

function valueAt(argv: string[], idx: number, flag: string): string {
  const next = argv[idx + 1]
  if (next === undefined || next.startsWith('--')) {
    throw new UsageError(`${flag} needs a value`)
  }
  return next
}

/** Value following `flag`, or undefined if the flag isn't given */
export function flagValue(argv: string[], flag: string): string | undefined {
  const idx = argv.indexOf(flag)
  return idx === -1 ? undefined : valueAt(argv, idx, flag)
}

/** Every value following an occurrence of `flag` */
export function flagValues(argv: string[], flag: string): string[] {
  const values: string[] = []
  argv.forEach((arg, i) => {
    if (arg === flag) values.push(valueAt(argv, i, flag))
  })
  return values
}
