export { StringTextStream, FileTextStream } from './text-stream.js';
