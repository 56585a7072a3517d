export { namedStream, pathLike } from './text-stream.js';
export type {
  RewindableTextStream,
  ClosableTextStream,
  NamedStreamInput,
  PathLikeInput,
  ExtractorInput,
} from './text-stream.js';
