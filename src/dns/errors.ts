export type DnsCodecErrorCode =
  | 'BUFFER_OVERRUN'
  | 'COMPRESSION_LOOP_EXCEEDED'
  | 'LABEL_TOO_LONG'
  | 'EMPTY_LABEL'
  | 'UNRECOGNIZED_ENUM_VALUE'
  | 'INVALID_ADDRESS'
  | 'VALUE_OUT_OF_RANGE'
  | 'UNSUPPORTED_RECORD';

export class DnsCodecError extends Error {
  readonly code: DnsCodecErrorCode;

  constructor(code: DnsCodecErrorCode, message: string) {
    super(message);
    this.name = 'DnsCodecError';
    this.code = code;
  }
}
