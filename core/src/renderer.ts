/**
 * SVG renderer for artwork attributes.
 *
 * Produces a fixed 400×400 document: a diagonal gradient background from
 * colorA to colorB, a shape-specific foreground, and a caption at (200,380).
 */

import type { AssetId, Attributes } from './types.js'
import { CANVAS_SIZE, DEFAULT_COLLECTION_NAME, STAR_POINTS } from './constants.js'
import { toDecimalString, toHexColor } from './encoding.js'

/**
 * Render the artwork for an asset as an SVG markup string.
 *
 * @example
 * ```typescript
 * const svg = renderArtwork(7, { colorA: 0xff0000, colorB: 0x0000ff, shape: 'Circles' })
 * // <svg xmlns="http://www.w3.org/2000/svg" width="400" ...
 * ```
 */
export function renderArtwork(
  assetId: AssetId,
  attributes: Attributes,
  collectionName: string = DEFAULT_COLLECTION_NAME
): string {
  const a = fill(attributes.colorA)
  const b = fill(attributes.colorB)
  const size = toDecimalString(CANVAS_SIZE)

  return (
    `<svg xmlns="http://www.w3.org/2000/svg" width="${size}" height="${size}" viewBox="0 0 ${size} ${size}">` +
    '<defs><linearGradient id="bg" x1="0" y1="0" x2="1" y2="1">' +
    `<stop offset="0%" stop-color="${a}"/>` +
    `<stop offset="100%" stop-color="${b}"/>` +
    '</linearGradient></defs>' +
    `<rect width="${size}" height="${size}" fill="url(#bg)"/>` +
    renderForeground(attributes, a, b) +
    '<text x="200" y="380" font-family="monospace" font-size="20" fill="#ffffff" text-anchor="middle">' +
    `${collectionName} #${toDecimalString(assetId)}` +
    '</text></svg>'
  )
}

function renderForeground(attributes: Attributes, a: string, b: string): string {
  switch (attributes.shape) {
    case 'Circles':
      return (
        `<circle cx="200" cy="200" r="120" fill="${a}" fill-opacity="0.95"/>` +
        `<circle cx="200" cy="200" r="70" fill="${b}" fill-opacity="0.85"/>`
      )
    case 'Rectangles':
      return (
        '<g transform="rotate(25 200 200)">' +
        `<rect x="80" y="80" width="240" height="240" rx="30" fill="${a}"/>` +
        `<rect x="110" y="110" width="180" height="180" rx="25" fill="${b}" fill-opacity="0.9"/>` +
        '</g>'
      )
    case 'StarPolygon':
      return (
        `<polygon points="${STAR_POINTS}" fill="${a}"/>` +
        `<circle cx="200" cy="200" r="45" fill="${b}"/>`
      )
  }
}

function fill(color: number): string {
  return '#' + toHexColor(color)
}
