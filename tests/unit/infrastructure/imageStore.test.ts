import { describe, expect, it } from 'vitest'
import { ValidationError } from '@domain/errors.ts'
import { decodeImage, detectImageFormat } from '@infrastructure/media/imageStore.ts'

function bytes(...parts: (number[] | string)[]): Buffer {
  return Buffer.concat(parts.map((part) => (typeof part === 'string' ? Buffer.from(part, 'ascii') : Buffer.from(part))))
}

describe('detectImageFormat', () => {
  it('recognizes PNG', () => {
    expect(detectImageFormat(bytes([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00]))).toBe('png')
  })

  it('recognizes JPEG', () => {
    expect(detectImageFormat(bytes([0xff, 0xd8, 0xff, 0xe0]))).toBe('jpg')
  })

  it('recognizes both GIF versions', () => {
    expect(detectImageFormat(bytes('GIF87a'))).toBe('gif')
    expect(detectImageFormat(bytes('GIF89a'))).toBe('gif')
  })

  it('recognizes WebP', () => {
    expect(detectImageFormat(bytes('RIFF', [0x24, 0x00, 0x00, 0x00], 'WEBPVP8 '))).toBe('webp')
  })

  it('rejects other RIFF containers', () => {
    expect(detectImageFormat(bytes('RIFF', [0x24, 0x00, 0x00, 0x00], 'WAVEfmt '))).toBeNull()
  })

  it('rejects text', () => {
    expect(detectImageFormat(bytes('hello world'))).toBeNull()
  })
})

describe('decodeImage', () => {
  it('uses the bytes rather than the declared type', () => {
    const gif = bytes('GIF89a', [0x01, 0x00, 0x01, 0x00])
    const decoded = decodeImage(`data:image/png;base64,${gif.toString('base64')}`, 1024)

    expect(decoded.format).toBe('gif')
    expect(decoded.data.equals(gif)).toBe(true)
  })

  it('rejects characters outside the base64 alphabet', () => {
    expect(() => decodeImage('data:image/png;base64,not*base64', 1024)).toThrow(ValidationError)
  })

  it('rejects an empty payload', () => {
    expect(() => decodeImage('data:image/png;base64,', 1024)).toThrow(ValidationError)
  })

  it('rejects images over the limit', () => {
    const jpeg = bytes([0xff, 0xd8, 0xff, 0xe0], Array.from({ length: 20 }, () => 0))

    try {
      decodeImage(jpeg.toString('base64'), 16)
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError)
      expect((err as ValidationError).fields).toEqual({ image: ['Image exceeds the 16 byte limit.'] })
    }
  })
})
