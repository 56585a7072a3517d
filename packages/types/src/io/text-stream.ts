/**
 * A character source that can be read from the start any number of times.
 * Extractors rewind before every traversal.
 */
export interface RewindableTextStream {
  /** Move the read position back to the first character. */
  rewind(): void;
  /** Read everything from the current position to the end. */
  read(): string;
}

export interface ClosableTextStream extends RewindableTextStream {
  close(): void;
}

/** A stream the caller already opened, labelled for the records it yields. */
export interface NamedStreamInput {
  kind: 'named-stream';
  stream: RewindableTextStream;
  label: string;
}

/** A filesystem path; the extractor opens it and labels records with its basename. */
export interface PathLikeInput {
  kind: 'path';
  path: string;
}

export type ExtractorInput = NamedStreamInput | PathLikeInput;

export function namedStream(stream: RewindableTextStream, label: string): NamedStreamInput {
  return { kind: 'named-stream', stream, label };
}

export function pathLike(path: string): PathLikeInput {
  return { kind: 'path', path };
}
