import { closeSync, openSync, writeFileSync } from 'fs'
import { extname } from 'path'
import { MergeRule, TokenFrequency } from './core'
import { OutputError } from './errors'
import { SymbolTable } from './symbol-table'

export let TOKEN_FILE_HEADER = 'Token\tFrequency'

export let MERGE_FILE_HEADER = 'Merge Rules (with original frequencies):'

export type OutputPaths = {
  tokens_file: string
  merges_file: string
}

/** @description "words.tsv" -> "words_tokens.txt" and "words_merges.txt" */
export function outputPaths(input_file: string): OutputPaths {
  let ext = extname(input_file)
  let base = ext ? input_file.slice(0, input_file.length - ext.length) : input_file
  return {
    tokens_file: base + '_tokens.txt',
    merges_file: base + '_merges.txt',
  }
}

/** @description tab-separated, one line per token with nonzero frequency */
export function formatTokenFile(frequencies: TokenFrequency[]): string {
  let text = TOKEN_FILE_HEADER + '\n'
  for (let token of frequencies) {
    text += token.chars + '\t' + token.frequency + '\n'
  }
  return text
}

export function formatMergeRule(symbols: SymbolTable, rule: MergeRule): string {
  let [a, b] = rule.pair
  return (
    `(${symbols.stringOf(a)}, ${symbols.stringOf(b)})` +
    ` -> ${symbols.stringOf(rule.result)}` +
    `, frequency: ${rule.reported_frequency}`
  )
}

/** @description one line per merge, in merge order */
export function formatMergeFile(
  symbols: SymbolTable,
  merges: MergeRule[],
): string {
  let text = MERGE_FILE_HEADER + '\n'
  for (let rule of merges) {
    text += formatMergeRule(symbols, rule) + '\n'
  }
  return text
}

/**
 * @description create the file if missing, without truncating it.
 * Called before training so an unwritable target fails early.
 */
export function checkOutputFile(file: string) {
  try {
    closeSync(openSync(file, 'a'))
  } catch (error) {
    throw new OutputError(file, error)
  }
}

export function writeOutputFile(file: string, content: string) {
  try {
    writeFileSync(file, content)
  } catch (error) {
    throw new OutputError(file, error)
  }
}
