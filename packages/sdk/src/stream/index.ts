export { StreamType, FRAME_HEADER_SIZE, demuxFrames, frameLines, type Frame } from './frames'
export { parseJsonLines, type JsonRecord } from './json-lines'
