import { expect } from 'chai'
import { BPETrainer, MergeRule, pickSeparator, train } from './core'
import { Corpus } from './corpus'
import { countPair, pairKey, PairIndex } from './pair-index'
import { comparePairs } from './pair-queue'

function toyCorpus(records: [word: string, weight: number][]): Corpus {
  let corpus = new Corpus()
  for (let [word, weight] of records) {
    corpus.addWord(word, weight)
  }
  return corpus
}

function describeRule(trainer: BPETrainer, rule: MergeRule) {
  let { symbols } = trainer
  return [
    symbols.stringOf(rule.pair[0]),
    symbols.stringOf(rule.pair[1]),
    symbols.stringOf(rule.result),
    rule.weighted_frequency,
    rule.reported_frequency,
  ]
}

/** @description deterministic pseudo random numbers in [0, 1) */
function mulberry32(seed: number) {
  return function () {
    let t = (seed += 0x6d2b79f5)
    t = Math.imul(t ^ (t >>> 15), 1 | t)
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

function randomCorpus(seed: number, alphabet: string, word_count: number) {
  let random = mulberry32(seed)
  let records: [string, number][] = []
  for (let i = 0; i < word_count; i++) {
    let length = 1 + Math.floor(random() * 8)
    let word = ''
    for (let j = 0; j < length; j++) {
      word += alphabet[Math.floor(random() * alphabet.length)]
    }
    records.push([word, 1 + Math.floor(random() * 3)])
  }
  return toyCorpus(records)
}

type IndexSnapshot = Record<string, { words: number[]; frequency: number }>

function snapshotIndex(index: PairIndex): IndexSnapshot {
  let snapshot: IndexSnapshot = {}
  for (let entry of index.pairs()) {
    snapshot[pairKey(entry.a, entry.b)] = {
      words: Array.from(entry.word_indices).sort((a, b) => a - b),
      frequency: entry.weighted_frequency,
    }
  }
  return snapshot
}

/** @description every adjacent pair with its weighted frequency, by full rescan */
function rescanPairs(corpus: Corpus) {
  let pairs = new Map<string, { a: number; b: number; frequency: number }>()
  for (let word of corpus.words) {
    let { tokens } = word
    for (let i = 0; i + 1 < tokens.length; i++) {
      let key = pairKey(tokens[i], tokens[i + 1])
      if (!pairs.has(key)) {
        pairs.set(key, { a: tokens[i], b: tokens[i + 1], frequency: 0 })
      }
    }
  }
  for (let pair of pairs.values()) {
    for (let word of corpus.words) {
      pair.frequency += countPair(word.tokens, pair.a, pair.b) * word.weight
    }
  }
  return pairs
}

describe('pickSeparator', () => {
  it('should prefer space when it is not used', () => {
    expect(pickSeparator(new Set(['a', 'b']))).equals(' ')
  })

  it('should skip characters used by the corpus', () => {
    expect(pickSeparator(new Set([' ', 'a']))).equals('\n')
    expect(pickSeparator(new Set([' ', '\n', '\0']))).equals('\ue000')
  })
})

describe('BPETrainer on weighted words', () => {
  // l o w | l o w e r | n e w e s t | w i d e s t
  // "e s" = 6 + 3 and "s t" = 6 + 3, tie resolved by smaller left string
  let records: [string, number][] = [
    ['low', 5],
    ['lower', 2],
    ['newest', 6],
    ['widest', 3],
  ]

  it('should merge the first three pairs in expected order', () => {
    let trainer = new BPETrainer(toyCorpus(records))
    trainer.mergeUntil({ max_iterations: 3 })
    expect(
      trainer.merge_rules.map(rule => describeRule(trainer, rule)),
    ).deep.equals([
      ['e', 's', 'es', 9, 2],
      ['es', 't', 'est', 9, 2],
      ['l', 'o', 'lo', 7, 2],
    ])
  })

  it('should assign new symbol ids after the initial characters', () => {
    let trainer = new BPETrainer(toyCorpus(records))
    trainer.mergeUntil({ max_iterations: 3 })
    // l o w e r n s t i d
    expect(trainer.symbols.strings().slice(0, 10).join('')).equals('lowernstid')
    expect(trainer.merge_rules.map(rule => rule.result)).deep.equals([
      10, 11, 12,
    ])
  })

  it('should produce the same merges on repeated runs', () => {
    let run = () => {
      let trainer = new BPETrainer(toyCorpus(records))
      trainer.mergeUntil()
      return trainer.merge_rules.map(rule => describeRule(trainer, rule))
    }
    expect(run()).deep.equals(run())
  })

  it('should only use merges with weighted frequency >= 2', () => {
    let trainer = new BPETrainer(toyCorpus(records))
    trainer.mergeUntil()
    expect(trainer.state).equals('terminated')
    for (let rule of trainer.merge_rules) {
      expect(rule.weighted_frequency).to.be.at.least(2)
    }
    expect(trainer.pair_index.best()?.weighted_frequency || 0).lessThan(2)
  })

  it('should keep the original word of every entry', () => {
    let corpus = toyCorpus(records)
    let trainer = new BPETrainer(corpus)
    trainer.mergeUntil()
    expect(corpus.words.map(word => word.original)).deep.equals([
      'low',
      'lower',
      'newest',
      'widest',
    ])
    for (let word of corpus.words) {
      expect(
        word.tokens.map(id => trainer.symbols.stringOf(id)).join(''),
      ).equals(word.original)
    }
  })
})

describe('BPETrainer on repeated characters', () => {
  it('should count "a a a a" as two occurrences of "a a"', () => {
    let trainer = new BPETrainer(toyCorpus([['aaaa', 1]]))
    let candidate = trainer.findNextMerge()
    expect(candidate).not.null
    expect(candidate!.a_chars).equals('a')
    expect(candidate!.b_chars).equals('a')
    expect(candidate!.weighted_frequency).equals(2)
  })

  it('should stop after "aa" when the word weighs 1', () => {
    // a a a a -> aa aa, then "aa aa" weighs 1 only
    let trainer = new BPETrainer(toyCorpus([['aaaa', 1]]))
    trainer.mergeUntil()
    expect(
      trainer.merge_rules.map(rule => describeRule(trainer, rule)),
    ).deep.equals([['a', 'a', 'aa', 2, 3]])
    expect(trainer.corpus.words[0].tokens).deep.equals([1, 1])
    expect(trainer.state).equals('terminated')
  })

  it('should merge up to "aaaa" when the word weighs 2', () => {
    let trainer = new BPETrainer(toyCorpus([['aaaa', 2]]))
    trainer.mergeUntil()
    expect(
      trainer.merge_rules.map(rule => describeRule(trainer, rule)),
    ).deep.equals([
      ['a', 'a', 'aa', 4, 3],
      ['aa', 'aa', 'aaaa', 2, 1],
    ])
    expect(trainer.corpus.words[0].tokens).deep.equals([2])
    expect(trainer.pair_index.size).equals(0)
  })

  it('should report overlapping corpus occurrences for token frequencies', () => {
    let trainer = new BPETrainer(toyCorpus([['aaaa', 2]]))
    trainer.mergeUntil()
    expect(trainer.tokenFrequencies()).deep.equals([
      { id: 0, chars: 'a', frequency: 4 },
      { id: 1, chars: 'aa', frequency: 3 },
      { id: 2, chars: 'aaaa', frequency: 1 },
    ])
  })
})

describe('findNextMerge', () => {
  let corpus: Corpus
  beforeEach(() => {
    // x x x x x x x x x x
    corpus = toyCorpus([['x'.repeat(10), 1]])
  })

  it('should find merge above frequency limit', () => {
    let trainer = new BPETrainer(corpus)
    let candidate = trainer.findNextMerge({ min_frequency: 5 })
    expect(candidate).not.null
    expect(candidate!.weighted_frequency).equals(5)
  })

  it('should not find merge below frequency limit', () => {
    let trainer = new BPETrainer(corpus)
    expect(trainer.findNextMerge({ min_frequency: 6 })).null
    expect(trainer.state).equals('terminated')
  })

  it('should skip merges exceeding length limit without dropping them', () => {
    let trainer = new BPETrainer(corpus)
    trainer.applyMerge(trainer.findNextMerge()!)
    // xx xx xx xx xx
    expect(trainer.findNextMerge({ max_length: 3 })).null
    let candidate = trainer.findNextMerge({ max_length: 4 })
    expect(candidate).not.null
    expect(candidate!.a_chars + candidate!.b_chars).equals('xxxx')
  })

  it('should reject outdated candidate', () => {
    let trainer = new BPETrainer(corpus)
    let candidate = trainer.findNextMerge()!
    trainer.applyMerge(candidate)
    expect(() => trainer.applyMerge(candidate)).to.throw(
      'outdated merge candidate',
    )
  })
})

describe('mergeUntil', () => {
  it('should stop at max_iterations and resume afterward', () => {
    let trainer = new BPETrainer(toyCorpus([['x'.repeat(10), 1]]))
    let rules = trainer.mergeUntil({ max_iterations: 1 })
    expect(rules).lengthOf(1)
    expect(trainer.state).equals('scanning')

    rules = trainer.mergeUntil()
    // xx xx xx xx xx -> xxxx xxxx xx
    expect(rules.map(rule => trainer.symbols.stringOf(rule.result))).deep.equals(
      ['xxxx'],
    )
    expect(trainer.merge_rules).lengthOf(2)
    expect(trainer.state).equals('terminated')
  })

  it('should call onMerge for each merge', () => {
    let trainer = new BPETrainer(toyCorpus([['abab', 1]]))
    let seen: MergeRule[] = []
    trainer.mergeUntil({}, rule => seen.push(rule))
    expect(seen).deep.equals(trainer.merge_rules)
    expect(seen).lengthOf(1)
  })

  it('should produce empty result for empty corpus', () => {
    let result = train(new Corpus())
    expect(result.merges).deep.equals([])
    expect(result.frequencies).deep.equals([])
    expect(result.symbols.size).equals(0)
  })
})

describe('incremental pair index', () => {
  for (let seed of [1, 2, 3, 4]) {
    it(`should match a full rebuild after every merge (seed ${seed})`, () => {
      let corpus = randomCorpus(seed, 'abc', 30)
      let trainer = new BPETrainer(corpus)
      let initial_tokens = corpus.words.reduce(
        (acc, word) => acc + word.tokens.length,
        0,
      )
      let iterations = 0
      for (;;) {
        let candidate = trainer.findNextMerge()
        if (!candidate) break

        let pairs = rescanPairs(corpus)
        let chosen = pairs.get(pairKey(candidate.a, candidate.b))
        expect(chosen?.frequency).equals(candidate.weighted_frequency)
        for (let pair of pairs.values()) {
          expect(pair.frequency).at.most(candidate.weighted_frequency)
          let order = comparePairs(
            {
              frequency: candidate.weighted_frequency,
              a_chars: candidate.a_chars,
              b_chars: candidate.b_chars,
            },
            {
              frequency: pair.frequency,
              a_chars: corpus.symbols.stringOf(pair.a),
              b_chars: corpus.symbols.stringOf(pair.b),
            },
          )
          expect(order).at.most(0)
        }

        trainer.applyMerge(candidate)
        iterations++

        expect(snapshotIndex(trainer.pair_index)).deep.equals(
          snapshotIndex(new PairIndex(corpus)),
        )
        for (let entry of trainer.pair_index.pairs()) {
          expect(
            trainer.pair_index.recountWeightedFrequency(entry.a, entry.b),
          ).equals(entry.weighted_frequency)
        }
      }
      expect(iterations).greaterThan(0)
      expect(iterations).at.most(initial_tokens - corpus.words.length)
    })
  }
})

describe('explainToken', () => {
  it('should show the merge tree of a token', () => {
    let trainer = new BPETrainer(toyCorpus([['aaaa', 2]]))
    trainer.mergeUntil()
    let a = { token: 'a', children: [] }
    let aa = { token: 'aa', children: [a, a] }
    expect(trainer.explainToken('aaaa')).deep.equals({
      token: 'aaaa',
      children: [aa, aa],
    })
    expect(trainer.explainToken('a')).deep.equals(a)
  })

  it('should return null for unknown token', () => {
    let trainer = new BPETrainer(toyCorpus([['ab', 1]]))
    expect(trainer.explainToken('ba')).null
  })
})

describe('toJSON', () => {
  it('should export vocab, merges and frequencies', () => {
    let trainer = new BPETrainer(toyCorpus([['aaaa', 2]]))
    trainer.mergeUntil()
    expect(trainer.toJSON()).deep.equals({
      vocab: { a: 0, aa: 1, aaaa: 2 },
      merges: ['a a', 'aa aa'],
      freq: { a: 4, aa: 3, aaaa: 1 },
    })
  })
})
