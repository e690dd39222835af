import { UsageError } from './errors'

/**
 * @description which record field becomes the word weight.
 *   - tf: second field
 *   - df: third field
 *   - none: every word weighs 1, extra fields are ignored
 */
export type WeightMode = 'tf' | 'df' | 'none'

export type LoadOptions = {
  /** @default 'tf' */
  weight?: WeightMode
}

export type MergeOptions = {
  /** @default 2 */
  min_frequency?: number
  /**
   * @description in codepoints of the merged token
   * @default unlimited
   */
  max_length?: number
  /** @default unlimited */
  max_iterations?: number
  /**
   * @description wall-clock limit in milliseconds, checked between merges
   * @default unlimited
   */
  max_duration?: number
}

export let DEFAULT_WEIGHT_MODE: WeightMode = 'tf'

export let DEFAULT_MIN_FREQUENCY = 2

export type CLIConfig = {
  input_file: string
  load: LoadOptions
  merge: MergeOptions
  json_file: string | null
  db_file: string | null
  quiet: boolean
}

export let usage = `
Usage: bpe-vocab <input_file> [options]

Options:
  --weight <tf|df|none>     record field used as word weight (default: tf)
  --min-frequency <n>       stop when no pair reaches n (default: 2)
  --max-length <n>          skip merges longer than n characters
  --max-iterations <n>      stop after n merges
  --max-duration <ms>       stop after ms milliseconds
  --json <file>             also export vocabulary as json
  --db <file>               also save vocabulary into sqlite database
  --quiet                   no progress output
`.trim()

function parsePositiveInt(flag: string, value: string): number {
  if (!/^\d+$/.test(value) || +value < 1) {
    throw new UsageError(`${flag} expects a positive integer, got: ${value}`)
  }
  return +value
}

function parseWeightMode(value: string): WeightMode {
  switch (value) {
    case 'tf':
    case 'df':
    case 'none':
      return value
    default:
      throw new UsageError(`--weight expects tf, df or none, got: ${value}`)
  }
}

/** @description parse arguments after the node and script path */
export function parseArgs(args: string[]): CLIConfig {
  let input_file: string | null = null
  let config: Omit<CLIConfig, 'input_file'> = {
    load: {},
    merge: {},
    json_file: null,
    db_file: null,
    quiet: false,
  }

  for (let i = 0; i < args.length; i++) {
    let arg = args[i]
    if (arg == '--quiet') {
      config.quiet = true
      continue
    }
    if (!arg.startsWith('--')) {
      if (input_file !== null) {
        throw new UsageError(`unexpected argument: ${arg}`)
      }
      input_file = arg
      continue
    }
    i++
    if (i >= args.length) {
      throw new UsageError(`missing value for ${arg}`)
    }
    let value = args[i]
    switch (arg) {
      case '--weight':
        config.load.weight = parseWeightMode(value)
        break
      case '--min-frequency':
        config.merge.min_frequency = parsePositiveInt(arg, value)
        break
      case '--max-length':
        config.merge.max_length = parsePositiveInt(arg, value)
        break
      case '--max-iterations':
        config.merge.max_iterations = parsePositiveInt(arg, value)
        break
      case '--max-duration':
        config.merge.max_duration = parsePositiveInt(arg, value)
        break
      case '--json':
        config.json_file = value
        break
      case '--db':
        config.db_file = value
        break
      default:
        throw new UsageError(`unknown option: ${arg}`)
    }
  }

  if (input_file === null) {
    throw new UsageError('missing input file')
  }

  return { input_file, ...config }
}
