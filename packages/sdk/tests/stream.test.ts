/**
 * Stream decoder tests
 */

import { describe, it, expect } from 'vitest'
import { StreamParseError } from '@podlink/shared/errors'
import { StreamType, demuxFrames, frameLines, parseJsonLines } from '../src/stream'
import { frame } from './setup'

describe('demuxFrames', () => {
  it('should split stdout and stderr frames', () => {
    const frames = demuxFrames(Buffer.concat([frame(1, 'hello\n'), frame(2, 'oops\n')]))

    expect(frames.map(f => [f.stream, f.data.toString()])).toEqual([
      [StreamType.STDOUT, 'hello\n'],
      [StreamType.STDERR, 'oops\n'],
    ])
  })

  it('should accept an empty payload', () => {
    expect(demuxFrames(new Uint8Array(0))).toEqual([])
  })

  it('should accept frames with an empty payload', () => {
    const frames = demuxFrames(frame(1, ''))

    expect(frames).toHaveLength(1)
    expect(frames[0]?.data.length).toBe(0)
  })

  it('should report an incomplete header with its offset', () => {
    const payload = Buffer.concat([frame(1, 'ok'), Buffer.from([1, 0, 0])])

    expect(() => demuxFrames(payload)).toThrow(StreamParseError)
    expect(() => demuxFrames(payload)).toThrow(
      'Incomplete frame header at offset 10: expected 8 bytes, got 3'
    )
  })

  it('should report an unknown stream type', () => {
    expect(() => demuxFrames(frame(7, 'x'))).toThrow('Unknown stream type 7 in frame header at offset 0')
  })

  it('should report a truncated payload', () => {
    const header = Buffer.alloc(8)
    header.writeUInt8(1, 0)
    header.writeUInt32BE(10, 4)

    expect(() => demuxFrames(Buffer.concat([header, Buffer.from('abcd')]))).toThrow(
      'Truncated frame payload at offset 0: expected 10 bytes, got 4'
    )
  })
})

describe('frameLines', () => {
  const frames = demuxFrames(
    Buffer.concat([frame(1, 'par'), frame(2, 'warn\n'), frame(1, 'tial\nnext\n')])
  )

  it('should join partial lines across frames of one stream', () => {
    expect(frameLines(frames, [StreamType.STDOUT])).toEqual(['partial', 'next'])
  })

  it('should select stderr only', () => {
    expect(frameLines(frames, [StreamType.STDERR])).toEqual(['warn'])
  })

  it('should return no lines when nothing was written', () => {
    expect(frameLines([], [StreamType.STDOUT])).toEqual([])
  })
})

describe('parseJsonLines', () => {
  it('should parse records and skip blank lines', () => {
    expect(parseJsonLines('{"stream":"a"}\n\n{"id":"x"}\n')).toEqual([{ stream: 'a' }, { id: 'x' }])
  })

  it('should name the malformed line', () => {
    expect(() => parseJsonLines('{"a":1}\n{oops')).toThrow('Malformed JSON at line 2: {oops')
  })

  it('should reject values that are not objects', () => {
    expect(() => parseJsonLines('[1]')).toThrow(StreamParseError)
    expect(() => parseJsonLines('[1]')).toThrow('Malformed JSON at line 1: [1]')
  })
})
