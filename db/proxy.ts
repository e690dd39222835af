import { proxySchema, ProxySchemaOptions } from 'better-sqlite3-proxy'

export type Token = {
  id?: null | number
  chars: string
  frequency: number
}

export type Merge = {
  id?: null | number
  a_id: number
  a?: Token
  b_id: number
  b?: Token
  c_id: number
  c?: Token
  weighted_frequency: number
  reported_frequency: number
}

export type DBProxy = {
  token: Token[]
  merge: Merge[]
}

export let tableFields: ProxySchemaOptions<DBProxy>['tableFields'] = {
  token: [],
  merge: [
    /* foreign references */
    ['a', { field: 'a_id', table: 'token' }],
    ['b', { field: 'b_id', table: 'token' }],
    ['c', { field: 'c_id', table: 'token' }],
  ],
}

export function createProxy(
  options: Omit<ProxySchemaOptions<DBProxy>, 'tableFields'>,
) {
  return proxySchema<DBProxy>({
    tableFields,
    ...options,
  })
}
