import { randomUUID } from 'node:crypto'
import { mkdir, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { ValidationError } from '@domain/errors.ts'
import { getConfig } from '../config.ts'

const RECIPE_IMAGE_DIR = 'uploads/recipe'
const INVALID_IMAGE = 'Upload a valid image. The file you uploaded was either not an image or a corrupted image.'

export type ImageFormat = 'png' | 'jpg' | 'gif' | 'webp'

export interface DecodedImage {
  data: Buffer
  format: ImageFormat
}

function startsWith(data: Buffer, bytes: number[], offset = 0): boolean {
  return bytes.every((byte, i) => data[offset + i] === byte)
}

function ascii(text: string): number[] {
  return Array.from(text, (ch) => ch.charCodeAt(0))
}

/** Identify the image format from its leading bytes */
export function detectImageFormat(data: Buffer): ImageFormat | null {
  if (startsWith(data, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) return 'png'
  if (startsWith(data, [0xff, 0xd8, 0xff])) return 'jpg'
  if (startsWith(data, ascii('GIF87a')) || startsWith(data, ascii('GIF89a'))) return 'gif'
  if (startsWith(data, ascii('RIFF')) && startsWith(data, ascii('WEBP'), 8)) return 'webp'
  return null
}

/**
 * Decode a base64 image, with or without its `data:image/...;base64,`
 * prefix. The declared content type is ignored; the bytes decide.
 */
export function decodeImage(encoded: string, maxBytes = getConfig().maxImageBytes): DecodedImage {
  const base64 = encoded.replace(/^data:[\w/+.-]+;base64,/, '').replace(/\s/g, '')
  if (!base64 || !/^[A-Za-z0-9+/]+={0,2}$/.test(base64)) {
    throw new ValidationError({ image: [INVALID_IMAGE] })
  }

  const data = Buffer.from(base64, 'base64')
  if (data.length > maxBytes) {
    throw new ValidationError({ image: [`Image exceeds the ${maxBytes} byte limit.`] })
  }

  const format = detectImageFormat(data)
  if (!format) {
    throw new ValidationError({ image: [INVALID_IMAGE] })
  }
  return { data, format }
}

/** Write a recipe image under a fresh name; returns its path relative to the media root */
export async function saveRecipeImage(image: DecodedImage): Promise<string> {
  const relativePath = `${RECIPE_IMAGE_DIR}/${randomUUID()}.${image.format}`
  const mediaRoot = getConfig().mediaRoot
  await mkdir(join(mediaRoot, RECIPE_IMAGE_DIR), { recursive: true })
  await writeFile(join(mediaRoot, relativePath), image.data)
  return relativePath
}

export async function deleteMediaFile(relativePath: string): Promise<void> {
  await rm(join(getConfig().mediaRoot, relativePath), { force: true })
}
