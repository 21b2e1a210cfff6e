/**
 * Reads the value of a flag exactly as it was typed.
 *
 * The argument parser turns numeric-looking values into numbers (`2.0` becomes
 * `2`), which breaks tag and branch names. Supports `--name value` and
 * `--name=value`; the last occurrence wins and parsing stops at `--`.
 *
 * @param rawArgs - Raw command line arguments.
 * @param name - Flag name without leading dashes.
 * @returns Raw value, or undefined when the flag has no value.
 */
export function readRawOption(
  rawArgs: string[],
  name: string,
): undefined | string {
  let flag = `--${name}`
  let value: undefined | string

  for (let [index, argument] of rawArgs.entries()) {
    if (argument === '--') {
      break
    }
    if (argument === flag) {
      let next = rawArgs[index + 1]
      if (next !== undefined && !next.startsWith('-')) {
        value = next
      }
    } else if (argument.startsWith(`${flag}=`)) {
      value = argument.slice(flag.length + 1)
    }
  }

  return value
}
