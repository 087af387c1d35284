/**
 * Metadata assembly: wraps the rendered artwork and its traits in a JSON
 * data URI.
 */

import type { MetadataInput } from './types.js'
import {
  DEFAULT_COLLECTION_NAME,
  DEFAULT_DESCRIPTION,
  JSON_DATA_URI_PREFIX,
  SVG_DATA_URI_PREFIX
} from './constants.js'
import { escapeJson, toDecimalString, toHexColor } from './encoding.js'
import { shapeDisplayName } from './attributes.js'
import { renderArtwork } from './renderer.js'

/**
 * Build the `data:application/json;utf8,` document for one asset.
 *
 * Keys are emitted in a fixed order with no whitespace. `name`,
 * `description` and `image` go through `escapeJson`; trait values are
 * generated from hex digits and fixed names and are inserted as-is.
 */
export function assembleMetadata(input: MetadataInput): string {
  const collectionName = input.collectionName ?? DEFAULT_COLLECTION_NAME
  const description = input.description ?? DEFAULT_DESCRIPTION
  const { assetId, attributes } = input

  const name = `${collectionName} #${toDecimalString(assetId)}`
  const palette = `#${toHexColor(attributes.colorA)} / #${toHexColor(attributes.colorB)}`
  const image = SVG_DATA_URI_PREFIX + renderArtwork(assetId, attributes, collectionName)

  const json =
    '{"name":"' + escapeJson(name) + '",' +
    '"description":"' + escapeJson(description) + '",' +
    '"attributes":[' +
    '{"trait_type":"palette","value":"' + palette + '"},' +
    '{"trait_type":"shape","value":"' + shapeDisplayName(attributes.shape) + '"}' +
    '],' +
    '"image":"' + escapeJson(image) + '"}'

  return JSON_DATA_URI_PREFIX + json
}
