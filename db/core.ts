import { DBInstance, newDB, toSafeMode } from 'better-sqlite3-schema'
import { TrainResult, VocabularyJSON } from '../core'
import { migrationSQL } from './migration'
import { DBProxy, createProxy } from './proxy'

/** @description merge rule with symbols referred by their strings */
export type StoredMerge = {
  a: string
  b: string
  c: string
  weighted_frequency: number
  reported_frequency: number
}

/**
 * @description persist a trained vocabulary into sqlite.
 * Token row id is symbol id + 1.
 */
export class VocabularyDB {
  db: DBInstance
  proxy: DBProxy

  constructor(options: { db: DBInstance }) {
    let { db } = options
    db.migrate({ migrations: [migrationSQL] })
    this.db = db
    this.proxy = createProxy({ db })

    this.save = db.transaction(this.save)
    this.load = db.transaction(this.load)
  }

  /** @description replace the stored tokens and merges */
  save(result: TrainResult) {
    let { proxy } = this
    let { token: token_table, merge: merge_table } = proxy
    merge_table.length = 0
    token_table.length = 0

    let frequencies = new Map<number, number>()
    for (let token of result.frequencies) {
      frequencies.set(token.id, token.frequency)
    }

    result.symbols.strings().forEach((chars, index) => {
      let id = index + 1
      token_table[id] = { id, chars, frequency: frequencies.get(index) || 0 }
    })

    for (let rule of result.merges) {
      merge_table.push({
        a_id: rule.pair[0] + 1,
        b_id: rule.pair[1] + 1,
        c_id: rule.result + 1,
        weighted_frequency: rule.weighted_frequency,
        reported_frequency: rule.reported_frequency,
      })
    }
  }

  /** @description restore in the same shape as `BPETrainer.toJSON()` */
  load(): VocabularyJSON {
    let { proxy } = this
    let json: VocabularyJSON = { vocab: {}, merges: [], freq: {} }
    for (let token of proxy.token) {
      json.vocab[token.chars] = token.id! - 1
      if (token.frequency > 0) {
        json.freq[token.chars] = token.frequency
      }
    }
    for (let merge of this.loadMerges()) {
      json.merges.push(merge.a + ' ' + merge.b)
    }
    return json
  }

  loadMerges(): StoredMerge[] {
    let merges: StoredMerge[] = []
    for (let merge of this.proxy.merge) {
      merges.push({
        a: merge.a!.chars,
        b: merge.b!.chars,
        c: merge.c!.chars,
        weighted_frequency: merge.weighted_frequency,
        reported_frequency: merge.reported_frequency,
      })
    }
    return merges
  }
}

/** @description delete all tokens and merges from database */
export function resetVocabularyDB(db: DBInstance) {
  db.migrate({ migrations: [migrationSQL] })
  let proxy = createProxy({ db })
  proxy.merge.length = 0
  proxy.token.length = 0
}

export function connectDB(path: string): DBInstance {
  let db = newDB({
    path,
    migrate: false,
  })
  toSafeMode(db)
  return db
}
