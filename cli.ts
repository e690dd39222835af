#!/usr/bin/env node
import { startTimer } from '@beenotung/tslib/timer'
import { readFileSync } from 'fs'
import { CLIConfig, parseArgs, usage } from './config'
import { BPETrainer } from './core'
import { Corpus } from './corpus'
import { connectDB, VocabularyDB } from './db/core'
import { InputError, OutputError, UsageError } from './errors'
import {
  checkOutputFile,
  formatMergeFile,
  formatMergeRule,
  formatTokenFile,
  outputPaths,
  writeOutputFile,
} from './format'

function phase<T>(config: CLIConfig, name: string, fn: () => T): T {
  if (config.quiet) return fn()
  let timer = startTimer(name)
  try {
    return fn()
  } finally {
    timer.end()
  }
}

function readInput(file: string): Buffer {
  try {
    return readFileSync(file)
  } catch (error) {
    throw new InputError(file, error)
  }
}

function saveToDB(file: string, trainer: BPETrainer) {
  try {
    let db = connectDB(file)
    try {
      new VocabularyDB({ db }).save(trainer.result())
    } finally {
      db.close()
    }
  } catch (error) {
    throw new OutputError(file, error)
  }
}

/** @description train from the input file and write the output files */
export function runTraining(config: CLIConfig): BPETrainer {
  let { input_file, quiet } = config
  let log = quiet ? () => {} : console.log.bind(console)
  let content = readInput(input_file)

  let { tokens_file, merges_file } = outputPaths(input_file)
  checkOutputFile(tokens_file)
  checkOutputFile(merges_file)
  if (config.json_file) {
    checkOutputFile(config.json_file)
  }

  let corpus = phase(config, 'load corpus', () =>
    new Corpus().load(content, {
      ...config.load,
      onSkip: quiet ? undefined : error => console.warn(error.message),
    }),
  )
  log(
    `read ${corpus.words.length} words` +
      ` (skipped ${corpus.skipped.length} lines),` +
      ` initial vocabulary size: ${corpus.symbols.size}`,
  )

  let trainer = phase(
    config,
    'build pair index and suffix automaton',
    () => new BPETrainer(corpus),
  )

  phase(config, 'merge pairs', () =>
    trainer.mergeUntil(config.merge, rule => {
      if (quiet) return
      process.stdout.write(
        `\r merges: ${trainer.merge_rules.length}` +
          ` | symbols: ${trainer.symbols.size}` +
          ` | weighted: ${rule.weighted_frequency}` +
          ` | ${formatMergeRule(trainer.symbols, rule)}` +
          '  ',
      )
    }),
  )
  if (!quiet && trainer.merge_rules.length > 0) {
    process.stdout.write('\n')
  }
  log(`merging completed after ${trainer.merge_rules.length} merges`)

  let frequencies = phase(config, 'count token frequencies', () =>
    trainer.tokenFrequencies(),
  )
  log(`final vocabulary size: ${frequencies.length}`)

  phase(config, 'write output', () => {
    writeOutputFile(tokens_file, formatTokenFile(frequencies))
    writeOutputFile(
      merges_file,
      formatMergeFile(trainer.symbols, trainer.merge_rules),
    )
    if (config.json_file) {
      writeOutputFile(
        config.json_file,
        JSON.stringify(trainer.toJSON(), null, 2) + '\n',
      )
    }
    if (config.db_file) {
      saveToDB(config.db_file, trainer)
    }
  })
  log(`tokens written to: ${tokens_file}`)
  log(`merge rules written to: ${merges_file}`)

  return trainer
}

/** @description returns the process exit code */
export function main(args: string[]): number {
  try {
    runTraining(parseArgs(args))
    return 0
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message)
      console.error(usage)
      return 1
    }
    if (error instanceof InputError || error instanceof OutputError) {
      console.error(error.message)
      return 1
    }
    throw error
  }
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2))
}
