export type CorrectorErrorKind = "InvalidArguments" | "UnreadableFile" | "InvalidEncoding" | "UnwritableFile";

const EXIT_CODES: Record<CorrectorErrorKind, number> = {
  InvalidArguments: 1,
  UnreadableFile: 2,
  InvalidEncoding: 2,
  UnwritableFile: 2,
};

export class CorrectorError extends Error {
  readonly exitCode: number;

  constructor(public readonly kind: CorrectorErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CorrectorError";
    this.exitCode = EXIT_CODES[kind];
  }
}
