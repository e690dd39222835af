import { DEFAULT_WEIGHT_MODE, LoadOptions, WeightMode } from './config'
import { DecodeError, RecordParseError, SkipError } from './errors'
import { SymbolID, SymbolTable } from './symbol-table'

export type WordEntry = {
  /** @description the word as read from the corpus, never changed */
  original: string
  /** @description integer >= 1 */
  weight: number
  /** @description current segmentation, replaced as a whole on merge */
  tokens: SymbolID[]
}

export type CorpusRecord = {
  word: string
  weight: number
}

export type CorpusLine = {
  line_number: number
  line: string
}

let LF_BYTE = 0x0a
let CR_BYTE = 0x0d

/** @description field position of the weight, counting the word as 0 */
let weight_field: Record<WeightMode, number | null> = {
  tf: 1,
  df: 2,
  none: null,
}

/**
 * @description split into lines and decode each line as strict UTF-8.
 * A line with invalid bytes becomes a DecodeError instead of a string.
 * Line numbers start from 1.
 */
export function* decodeLines(
  content: Uint8Array | string,
): Generator<CorpusLine | DecodeError> {
  if (typeof content == 'string') {
    let lines = content.split('\n')
    for (let i = 0; i < lines.length; i++) {
      let line = lines[i]
      if (line.endsWith('\r')) {
        line = line.slice(0, line.length - 1)
      }
      yield { line_number: i + 1, line }
    }
    return
  }
  let decoder = new TextDecoder('utf-8', { fatal: true })
  let line_number = 0
  for (let start = 0; start <= content.length; ) {
    let end = content.indexOf(LF_BYTE, start)
    if (end == -1) end = content.length
    line_number++
    let line_end = end
    if (line_end > start && content[line_end - 1] == CR_BYTE) {
      line_end--
    }
    let bytes = content.subarray(start, line_end)
    let decoded: CorpusLine | DecodeError
    try {
      decoded = { line_number, line: decoder.decode(bytes) }
    } catch (error) {
      if (!(error instanceof TypeError)) throw error
      decoded = new DecodeError(line_number, new Uint8Array(bytes))
    }
    yield decoded
    start = end + 1
  }
}

/**
 * @description parse `word [tf [df]]`.
 * Returns null for blank lines.
 */
export function parseRecord(
  line: CorpusLine,
  mode: WeightMode = DEFAULT_WEIGHT_MODE,
): CorpusRecord | RecordParseError | null {
  let text = line.line.trim()
  if (!text) return null
  let fields = text.split(/\s+/)
  if (fields.length > 3) {
    return new RecordParseError(line.line_number, line.line, 'too many fields')
  }
  let word = fields[0]
  let index = weight_field[mode]
  if (index === null || index >= fields.length) {
    return { word, weight: 1 }
  }
  let field = fields[index]
  let weight = +field
  if (!/^\d+$/.test(field) || !Number.isSafeInteger(weight) || weight < 1) {
    return new RecordParseError(
      line.line_number,
      line.line,
      `invalid ${mode}: ${field}`,
    )
  }
  return { word, weight }
}

export class Corpus {
  words: WordEntry[] = []

  /** @description recoverable errors from loading, in line order */
  skipped: SkipError[] = []

  constructor(public symbols: SymbolTable = new SymbolTable()) {}

  /**
   * @description add one word, each codepoint as an initial symbol.
   * Duplicated words are kept as separated entries.
   */
  addWord(original: string, weight = 1): WordEntry {
    if (!Number.isSafeInteger(weight) || weight < 1) {
      throw new Error(`invalid word weight: ${weight}`)
    }
    let { symbols } = this
    let tokens: SymbolID[] = []
    for (let char of original) {
      tokens.push(symbols.intern(char))
    }
    let word: WordEntry = { original, weight, tokens }
    this.words.push(word)
    return word
  }

  /** @description parse and add all records, skipping the malformed ones */
  load(
    content: Uint8Array | string,
    options?: LoadOptions & {
      onSkip?: (error: SkipError) => void
    },
  ): this {
    let mode = options?.weight || DEFAULT_WEIGHT_MODE
    let onSkip = options?.onSkip
    for (let line of decodeLines(content)) {
      let record = line instanceof DecodeError ? line : parseRecord(line, mode)
      if (!record) continue
      if (record instanceof DecodeError || record instanceof RecordParseError) {
        this.skipped.push(record)
        onSkip?.(record)
        continue
      }
      this.addWord(record.word, record.weight)
    }
    return this
  }

  /** @description codepoints that appear in any word */
  alphabet(): Set<string> {
    let chars = new Set<string>()
    for (let word of this.words) {
      for (let char of word.original) {
        chars.add(char)
      }
    }
    return chars
  }
}
