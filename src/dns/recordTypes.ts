import { indexByCode, namesOf } from './enums.js';

export const QUERY_TYPES = {
  A: 1,
  NS: 2,
  MD: 3,
  MF: 4,
  CNAME: 5,
  SOA: 6,
  MB: 7,
  MG: 8,
  MR: 9,
  NULL: 10,
  WKS: 11,
  PTR: 12,
  HINFO: 13,
  MINFO: 14,
  MX: 15,
  TXT: 16,
  AXFR: 252,
  MAILB: 253,
  MAILA: 254,
  ANY: 255,
} as const;

export const QUERY_CLASSES = {
  IN: 1,
  CS: 2,
  CH: 3,
  HS: 4,
  ANY: 255,
} as const;

export type QueryType = keyof typeof QUERY_TYPES;
export type QueryClass = keyof typeof QUERY_CLASSES;

export const QUERY_TYPE_NAMES: readonly QueryType[] = namesOf(QUERY_TYPES);
export const QUERY_CLASS_NAMES: readonly QueryClass[] = namesOf(QUERY_CLASSES);

export const QUERY_TYPE_BY_CODE = indexByCode(QUERY_TYPES);
export const QUERY_CLASS_BY_CODE = indexByCode(QUERY_CLASSES);
