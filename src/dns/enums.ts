import { DnsCodecError } from './errors.js';

export type CodeTable<K extends string> = Readonly<Record<K, number>>;

export function namesOf<K extends string>(table: CodeTable<K>): K[] {
  const names: K[] = [];
  for (const name in table) names.push(name);
  return names;
}

export function indexByCode<K extends string>(table: CodeTable<K>): ReadonlyMap<number, K> {
  const byCode = new Map<number, K>();
  for (const name in table) byCode.set(table[name], name);
  return byCode;
}

/**
 * Maps a wire value back to its enumeration member. The enumerations are closed:
 * reserved or unassigned values are a decode error, not a passthrough.
 */
export function nameForCode<K extends string>(kind: string, byCode: ReadonlyMap<number, K>, code: number): K {
  const name = byCode.get(code);
  if (name === undefined) {
    throw new DnsCodecError('UNRECOGNIZED_ENUM_VALUE', `Unrecognized DNS ${kind} value: ${code}`);
  }
  return name;
}
