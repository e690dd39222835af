export type SymbolID = number

/**
 * @description append-only interning of token strings into dense ids.
 * Single characters are interned at load time, merge results afterward.
 */
export class SymbolTable {
  /** @description id -> chars */
  private id_to_chars: string[] = []

  /** @description chars -> id */
  private chars_to_id = new Map<string, SymbolID>()

  get size(): number {
    return this.id_to_chars.length
  }

  /** @description return the existing id, or allocate the next one */
  intern(chars: string): SymbolID {
    let id = this.chars_to_id.get(chars)
    if (id !== undefined) return id
    id = this.id_to_chars.length
    this.id_to_chars.push(chars)
    this.chars_to_id.set(chars, id)
    return id
  }

  lookup(chars: string): SymbolID | undefined {
    return this.chars_to_id.get(chars)
  }

  stringOf(id: SymbolID): string {
    let chars = this.id_to_chars[id]
    if (chars === undefined) {
      throw new Error(`unknown symbol id: ${id}`)
    }
    return chars
  }

  /** @description all strings in id order */
  strings(): readonly string[] {
    return this.id_to_chars
  }
}
