import { StreamParseError } from '@podlink/shared/errors'

/**
 * Stream a multiplexed frame belongs to
 */
export enum StreamType {
  STDIN = 0,
  STDOUT = 1,
  STDERR = 2,
}

export interface Frame {
  stream: StreamType
  data: Buffer
}

/** stream type (1) + padding (3) + big-endian payload length (4) */
export const FRAME_HEADER_SIZE = 8

function isStreamType(value: number): value is StreamType {
  return value === StreamType.STDIN || value === StreamType.STDOUT || value === StreamType.STDERR
}

/**
 * Split a multiplexed log/attach payload into frames
 */
export function demuxFrames(payload: Uint8Array): Frame[] {
  const buffer = Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength)
  const frames: Frame[] = []
  let offset = 0

  while (offset < buffer.length) {
    const remaining = buffer.length - offset
    if (remaining < FRAME_HEADER_SIZE) {
      throw new StreamParseError(
        `Incomplete frame header at offset ${offset}: expected ${FRAME_HEADER_SIZE} bytes, got ${remaining}`
      )
    }

    const type = buffer.readUInt8(offset)
    if (!isStreamType(type)) {
      throw new StreamParseError(`Unknown stream type ${type} in frame header at offset ${offset}`)
    }

    const size = buffer.readUInt32BE(offset + 4)
    const start = offset + FRAME_HEADER_SIZE
    const available = buffer.length - start
    if (available < size) {
      throw new StreamParseError(
        `Truncated frame payload at offset ${offset}: expected ${size} bytes, got ${available}`
      )
    }

    frames.push({ stream: type, data: buffer.subarray(start, start + size) })
    offset = start + size
  }

  return frames
}

/**
 * Text lines written to the selected streams, in frame order
 */
export function frameLines(frames: readonly Frame[], streams: readonly StreamType[]): string[] {
  const text = Buffer.concat(
    frames.filter(frame => streams.includes(frame.stream)).map(frame => frame.data)
  ).toString('utf-8')

  if (text.length === 0) {
    return []
  }

  const lines = text.split('\n')
  if (lines[lines.length - 1] === '') {
    lines.pop()
  }
  return lines
}
