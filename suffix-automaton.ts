/**
 * @description suffix automaton over codepoints,
 * answering the number of (possibly overlapping) occurrences of any substring.
 *
 * Each state stands for a class of substrings sharing the same end positions.
 * `occ` starts at 1 for states created by an extension and 0 for clones,
 * then is summed up along suffix links from the longest states down.
 */
export class SuffixAutomaton {
  /** @description length of the longest substring in the state */
  private len: number[] = [0]

  /** @description suffix link, -1 for the initial state */
  private link: number[] = [-1]

  /** @description codepoint -> state */
  private next: Map<number, number>[] = [new Map()]

  /** @description number of end positions, complete after `finish()` */
  private occ: number[] = [0]

  /** @description state of the whole text read so far */
  private last = 0

  private finished = false

  /** @description number of codepoints consumed */
  length = 0

  constructor(text?: string) {
    if (text !== undefined) {
      this.extendText(text)
      this.finish()
    }
  }

  get stateCount(): number {
    return this.len.length
  }

  extendText(text: string) {
    for (let char of text) {
      this.extend(char.codePointAt(0)!)
    }
  }

  extend(code: number) {
    if (this.finished) {
      throw new Error('suffix automaton is finished, cannot extend further')
    }
    let { len, link, next } = this
    let cur = this.addState(len[this.last] + 1, 1)
    let p = this.last
    let q: number | undefined = undefined
    for (; p != -1; p = link[p]) {
      q = next[p].get(code)
      if (q !== undefined) break
      next[p].set(code, cur)
    }
    if (q === undefined) {
      link[cur] = 0
    } else {
      if (len[p] + 1 == len[q]) {
        link[cur] = q
      } else {
        let clone = this.addState(len[p] + 1, 0)
        next[clone] = new Map(next[q])
        link[clone] = link[q]
        for (; p != -1 && next[p].get(code) == q; p = link[p]) {
          next[p].set(code, clone)
        }
        link[q] = clone
        link[cur] = clone
      }
    }
    this.last = cur
    this.length++
  }

  /** @description propagate end position counts along suffix links */
  finish() {
    if (this.finished) return
    this.finished = true
    let { len, link, occ } = this
    let state_count = len.length
    let max_len = this.length

    // counting sort by len, descending
    let bucket = new Array<number>(max_len + 2).fill(0)
    for (let state = 0; state < state_count; state++) {
      bucket[len[state]]++
    }
    for (let i = 1; i <= max_len; i++) {
      bucket[i] += bucket[i - 1]
    }
    let order = new Array<number>(state_count)
    for (let state = state_count - 1; state >= 0; state--) {
      order[--bucket[len[state]]] = state
    }

    for (let i = state_count - 1; i > 0; i--) {
      let state = order[i]
      let parent = link[state]
      if (parent != -1) {
        occ[parent] += occ[state]
      }
    }
  }

  /** @description 0 for the empty string and for strings never seen */
  countOccurrences(pattern: string): number {
    if (!this.finished) {
      throw new Error('suffix automaton is not finished')
    }
    if (!pattern) return 0
    let { next } = this
    let state = 0
    for (let char of pattern) {
      let target = next[state].get(char.codePointAt(0)!)
      if (target === undefined) return 0
      state = target
    }
    return this.occ[state]
  }

  contains(pattern: string): boolean {
    return this.countOccurrences(pattern) > 0
  }

  private addState(state_len: number, state_occ: number): number {
    let state = this.len.length
    this.len.push(state_len)
    this.link.push(-1)
    this.next.push(new Map())
    this.occ.push(state_occ)
    return state
  }
}
