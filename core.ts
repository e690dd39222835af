import { DEFAULT_MIN_FREQUENCY, MergeOptions } from './config'
import { Corpus } from './corpus'
import { PairEntry, PairIndex } from './pair-index'
import { SuffixAutomaton } from './suffix-automaton'
import { SymbolID, SymbolTable } from './symbol-table'

/**
 * @description a + b -> result, e.g. "app" + "le" -> "apple".
 * Appended once per merge, never changed afterward.
 */
export type MergeRule = {
  pair: [a: SymbolID, b: SymbolID]
  result: SymbolID
  /** @description the score used to select this merge */
  weighted_frequency: number
  /** @description occurrences of the merged string in the original words */
  reported_frequency: number
}

export type MergeCandidate = {
  a: SymbolID
  b: SymbolID
  a_chars: string
  b_chars: string
  weighted_frequency: number
}

export type TokenFrequency = {
  id: SymbolID
  chars: string
  frequency: number
}

export type TrainResult = {
  symbols: SymbolTable
  merges: MergeRule[]
  /** @description in id order, zero-frequency symbols are excluded */
  frequencies: TokenFrequency[]
}

/** @description for export, with symbols referred by their strings */
export type VocabularyJSON = {
  /** @description chars -> symbol id, all symbols */
  vocab: Record<string, number>
  /** @description "a b" in merge order */
  merges: string[]
  /** @description chars -> occurrences in corpus, nonzero only */
  freq: Record<string, number>
}

export type TokenTree = {
  token: string
  children: TokenTree[]
}

export type TrainerState = 'scanning' | 'terminated'

let SEPARATOR_CANDIDATES = [' ', '\n', '\0']
let PRIVATE_USE_START = 0xe000
let MAX_CODEPOINT = 0x10ffff

/** @description a character not in the alphabet, to join words for the suffix automaton */
export function pickSeparator(alphabet: Set<string>): string {
  for (let char of SEPARATOR_CANDIDATES) {
    if (!alphabet.has(char)) return char
  }
  for (let code = PRIVATE_USE_START; code <= MAX_CODEPOINT; code++) {
    let char = String.fromCodePoint(code)
    if (!alphabet.has(char)) return char
  }
  throw new Error('no character left to use as word separator')
}

/** @description suffix automaton over every original word followed by a separator */
export function buildFrequencyOracle(corpus: Corpus): SuffixAutomaton {
  let separator = pickSeparator(corpus.alphabet()).codePointAt(0)!
  let automaton = new SuffixAutomaton()
  for (let word of corpus.words) {
    automaton.extendText(word.original)
    automaton.extend(separator)
  }
  automaton.finish()
  return automaton
}

function codepointLength(chars: string): number {
  let length = 0
  for (let _char of chars) length++
  return length
}

export class BPETrainer {
  symbols: SymbolTable

  pair_index: PairIndex

  /** @description counts substrings of the original words, read-only */
  oracle: SuffixAutomaton

  /** @description in merge order */
  merge_rules: MergeRule[] = []

  state: TrainerState = 'scanning'

  /** @description symbol id -> the rule that first produced it */
  private created_by = new Map<SymbolID, MergeRule>()

  constructor(public corpus: Corpus) {
    this.symbols = corpus.symbols
    this.pair_index = new PairIndex(corpus)
    this.oracle = buildFrequencyOracle(corpus)
  }

  /**
   * @description called by `mergeUntil()`.
   * Returns null and switches to terminated when no pair reaches `min_frequency`.
   */
  findNextMerge(options?: {
    /** @default 2 */
    min_frequency?: number
    /** @default unlimited */
    max_length?: number
  }): MergeCandidate | null {
    let { symbols } = this
    let min_frequency = options?.min_frequency || DEFAULT_MIN_FREQUENCY
    let max_length = options?.max_length

    let accept: ((entry: PairEntry) => boolean) | undefined
    if (max_length) {
      let limit = max_length
      accept = entry =>
        codepointLength(symbols.stringOf(entry.a)) +
          codepointLength(symbols.stringOf(entry.b)) <=
        limit
    }

    let entry = this.pair_index.best(accept)
    if (!entry || entry.weighted_frequency < min_frequency) {
      this.state = 'terminated'
      return null
    }

    this.state = 'scanning'
    return {
      a: entry.a,
      b: entry.b,
      a_chars: symbols.stringOf(entry.a),
      b_chars: symbols.stringOf(entry.b),
      weighted_frequency: entry.weighted_frequency,
    }
  }

  /**
   * @description called by `mergeUntil()`.
   * The candidate must come from `findNextMerge()` without other merges in between.
   */
  applyMerge(candidate: MergeCandidate): MergeRule {
    let { a, b } = candidate
    let entry = this.pair_index.get(a, b)
    if (!entry || entry.weighted_frequency != candidate.weighted_frequency) {
      throw new Error(
        `outdated merge candidate: ${JSON.stringify([candidate.a_chars, candidate.b_chars])}`,
      )
    }
    let chars = candidate.a_chars + candidate.b_chars
    let c = this.symbols.intern(chars)
    let rule: MergeRule = {
      pair: [a, b],
      result: c,
      weighted_frequency: candidate.weighted_frequency,
      reported_frequency: this.oracle.countOccurrences(chars),
    }
    this.merge_rules.push(rule)
    if (!this.created_by.has(c)) {
      this.created_by.set(c, rule)
    }
    this.pair_index.mergePair(a, b, c)
    return rule
  }

  /**
   * @description call `findNextMerge()` and `applyMerge()` in loop.
   * Returns the rules created by this call.
   */
  mergeUntil(
    options?: MergeOptions,
    onMerge?: (rule: MergeRule) => void,
  ): MergeRule[] {
    let max_iterations = options?.max_iterations
    let max_duration = options?.max_duration
    let start_time = Date.now()
    let rules: MergeRule[] = []
    for (
      let iteration = 1;
      !max_iterations || iteration <= max_iterations;
      iteration++
    ) {
      if (max_duration && Date.now() - start_time >= max_duration) break
      let candidate = this.findNextMerge(options)
      if (!candidate) break
      let rule = this.applyMerge(candidate)
      rules.push(rule)
      onMerge?.(rule)
    }
    return rules
  }

  /** @description corpus occurrences of every symbol ever created, zero excluded */
  tokenFrequencies(): TokenFrequency[] {
    let { oracle } = this
    let frequencies: TokenFrequency[] = []
    this.symbols.strings().forEach((chars, id) => {
      let frequency = oracle.countOccurrences(chars)
      if (frequency > 0) {
        frequencies.push({ id, chars, frequency })
      }
    })
    return frequencies
  }

  result(): TrainResult {
    return {
      symbols: this.symbols,
      merges: this.merge_rules,
      frequencies: this.tokenFrequencies(),
    }
  }

  toJSON(): VocabularyJSON {
    let { symbols } = this
    let vocab: Record<string, number> = {}
    symbols.strings().forEach((chars, id) => {
      vocab[chars] = id
    })
    let freq: Record<string, number> = {}
    for (let token of this.tokenFrequencies()) {
      freq[token.chars] = token.frequency
    }
    return {
      vocab,
      merges: this.merge_rules.map(
        rule =>
          symbols.stringOf(rule.pair[0]) + ' ' + symbols.stringOf(rule.pair[1]),
      ),
      freq,
    }
  }

  /**
   * @description how a token was built up by merges.
   * Initial characters are leaves. Returns null for unknown tokens.
   */
  explainToken(chars: string): TokenTree | null {
    let id = this.symbols.lookup(chars)
    if (id === undefined) return null
    return this.buildTokenTree(id)
  }

  private buildTokenTree(id: SymbolID): TokenTree {
    let token = this.symbols.stringOf(id)
    let rule = this.created_by.get(id)
    if (!rule) return { token, children: [] }
    return {
      token,
      children: [
        this.buildTokenTree(rule.pair[0]),
        this.buildTokenTree(rule.pair[1]),
      ],
    }
  }
}

/** @description build the trainer and merge until the floor or a limit is reached */
export function train(corpus: Corpus, options?: MergeOptions): TrainResult {
  let trainer = new BPETrainer(corpus)
  trainer.mergeUntil(options)
  return trainer.result()
}
