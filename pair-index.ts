import { Corpus } from './corpus'
import { PairQueue, QueuedPair } from './pair-queue'
import { SymbolID } from './symbol-table'

export type PairEntry = {
  a: SymbolID
  b: SymbolID
  /** @description words having "a b" adjacent at least once */
  word_indices: Set<number>
  /** @description sum of (occurrences in word x word weight) */
  weighted_frequency: number
}

/** @description occurrences of each adjacent pair in one word */
type PairCount = {
  a: SymbolID
  b: SymbolID
  count: number
}

export type MergeStats = {
  affected_words: number
  /** @description replaced occurrences, not weighted */
  occurrences: number
}

export function pairKey(a: SymbolID, b: SymbolID): string {
  return a + ',' + b
}

/**
 * @description count non-overlapping occurrences from left to right,
 * the same occurrences `mergeTokens()` would replace.
 * e.g. "x x x" contains one "x x", "x x x x" contains two.
 */
export function countPairs(tokens: SymbolID[]): Map<string, PairCount> {
  let counts = new Map<string, PairCount>()
  /** @description key -> start position of the last counted occurrence */
  let last_start = new Map<string, number>()
  for (let i = 0; i + 1 < tokens.length; i++) {
    let a = tokens[i]
    let b = tokens[i + 1]
    let key = pairKey(a, b)
    if (a == b && last_start.get(key) == i - 1) continue
    last_start.set(key, i)
    let pair = counts.get(key)
    if (pair) {
      pair.count++
    } else {
      counts.set(key, { a, b, count: 1 })
    }
  }
  return counts
}

export function countPair(tokens: SymbolID[], a: SymbolID, b: SymbolID) {
  let count = 0
  for (let i = 0; i + 1 < tokens.length; i++) {
    if (tokens[i] == a && tokens[i + 1] == b) {
      count++
      i++
    }
  }
  return count
}

/** @description replace every non-overlapping "a b" with c, scanning left to right */
export function mergeTokens(
  tokens: SymbolID[],
  a: SymbolID,
  b: SymbolID,
  c: SymbolID,
): SymbolID[] {
  let new_tokens: SymbolID[] = []
  for (let i = 0; i < tokens.length; ) {
    if (i + 1 < tokens.length && tokens[i] == a && tokens[i + 1] == b) {
      new_tokens.push(c)
      i += 2
    } else {
      new_tokens.push(tokens[i])
      i++
    }
  }
  return new_tokens
}

/**
 * @description adjacent pair -> words containing it.
 * Built once from the current segmentation of the corpus,
 * then kept in sync by `mergePair()` which only visits the affected words.
 */
export class PairIndex {
  private entries = new Map<string, PairEntry>()

  /** @description may contain outdated snapshots, checked on `best()` */
  private queue = new PairQueue()

  constructor(public corpus: Corpus) {
    let { words } = corpus
    for (let index = 0; index < words.length; index++) {
      let word = words[index]
      for (let [key, pair] of countPairs(word.tokens)) {
        let entry = this.entries.get(key)
        if (!entry) {
          entry = {
            a: pair.a,
            b: pair.b,
            word_indices: new Set(),
            weighted_frequency: 0,
          }
          this.entries.set(key, entry)
        }
        entry.word_indices.add(index)
        entry.weighted_frequency += pair.count * word.weight
      }
    }
    for (let entry of this.entries.values()) {
      this.enqueue(entry)
    }
  }

  get size(): number {
    return this.entries.size
  }

  get(a: SymbolID, b: SymbolID): PairEntry | undefined {
    return this.entries.get(pairKey(a, b))
  }

  pairs(): IterableIterator<PairEntry> {
    return this.entries.values()
  }

  weightedFrequencyOf(a: SymbolID, b: SymbolID): number {
    return this.get(a, b)?.weighted_frequency || 0
  }

  /** @description recount from the registered words' current tokens */
  recountWeightedFrequency(a: SymbolID, b: SymbolID): number {
    let entry = this.get(a, b)
    if (!entry) return 0
    let { words } = this.corpus
    let frequency = 0
    for (let index of entry.word_indices) {
      let word = words[index]
      frequency += countPair(word.tokens, a, b) * word.weight
    }
    return frequency
  }

  /**
   * @description the pair with highest weighted frequency.
   * Ties are resolved by the smaller left string, then the smaller right string.
   * Pairs rejected by `accept` are skipped but stay in the index.
   */
  best(accept?: (entry: PairEntry) => boolean): PairEntry | null {
    let { queue, entries } = this
    let skipped: QueuedPair[] = []
    let result: PairEntry | null = null
    for (;;) {
      let top = queue.peek()
      if (!top) break
      let entry = entries.get(pairKey(top.a, top.b))
      if (!entry || entry.weighted_frequency != top.frequency) {
        queue.pop()
        continue
      }
      if (accept && !accept(entry)) {
        queue.pop()
        skipped.push(top)
        continue
      }
      result = entry
      break
    }
    for (let top of skipped) {
      queue.push(top)
    }
    return result
  }

  /**
   * @description merge "a b" into c in every word registered under "a b",
   * then patch the registrations of the pairs that appeared or vanished.
   */
  mergePair(a: SymbolID, b: SymbolID, c: SymbolID): MergeStats {
    let key = pairKey(a, b)
    let target = this.entries.get(key)
    if (!target) {
      throw new Error(`pair not found in index: ${key}`)
    }
    let { entries } = this
    let { words } = this.corpus
    let changed = new Set<PairEntry>()
    let affected = Array.from(target.word_indices)
    let occurrences = 0

    for (let index of affected) {
      let word = words[index]
      let before = countPairs(word.tokens)
      word.tokens = mergeTokens(word.tokens, a, b, c)
      let after = countPairs(word.tokens)
      occurrences += before.get(key)?.count || 0

      for (let [pair_key, pair] of before) {
        let new_count = after.get(pair_key)?.count || 0
        if (new_count == pair.count) continue
        let entry = entries.get(pair_key)
        if (!entry) {
          throw new Error(`pair index out of sync: ${pair_key}`)
        }
        entry.weighted_frequency += (new_count - pair.count) * word.weight
        if (new_count == 0) {
          entry.word_indices.delete(index)
          if (entry.word_indices.size == 0) {
            entries.delete(pair_key)
          }
        }
        changed.add(entry)
      }

      for (let [pair_key, pair] of after) {
        if (before.has(pair_key)) continue
        let entry = entries.get(pair_key)
        if (!entry) {
          entry = {
            a: pair.a,
            b: pair.b,
            word_indices: new Set(),
            weighted_frequency: 0,
          }
          entries.set(pair_key, entry)
        }
        entry.word_indices.add(index)
        entry.weighted_frequency += pair.count * word.weight
        changed.add(entry)
      }
    }

    entries.delete(key)
    changed.delete(target)

    for (let entry of changed) {
      if (entries.get(pairKey(entry.a, entry.b)) === entry) {
        this.enqueue(entry)
      }
    }

    return { affected_words: affected.length, occurrences }
  }

  private enqueue(entry: PairEntry) {
    let { symbols } = this.corpus
    this.queue.push({
      a: entry.a,
      b: entry.b,
      frequency: entry.weighted_frequency,
      a_chars: symbols.stringOf(entry.a),
      b_chars: symbols.stringOf(entry.b),
    })
  }
}
