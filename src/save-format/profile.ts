import { createHash, getHashes } from 'node:crypto'
import { readFile } from 'node:fs/promises'
import invariant from 'tiny-invariant'
import { digestSize, slotCount } from './constants'
import type { BitOrder, SaveProfile } from './types'

/**
 * Layout of the current PC release. The flag blob position must match the
 * release the file came from; override it with a profile file otherwise.
 */
export const defaultProfile: SaveProfile = Object.freeze({
  name: 'bnd4-default',
  digestAlgorithm: 'md5',
  protectedEntryCount: slotCount + 1,
  eventFlags: Object.freeze({
    offset: 0x1c5a0,
    length: 0x1bf99f
  }),
  bitOrder: 'lsb'
})

const bitOrders: readonly BitOrder[] = ['lsb', 'msb']

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isBitOrder(value: unknown): value is BitOrder {
  return bitOrders.some((order) => order === value)
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0
}

/**
 * Merge a partial profile over the defaults and validate the result.
 */
export function resolveProfile(overrides: unknown = {}): SaveProfile {
  invariant(isRecord(overrides), 'Profile must be a JSON object.')

  const eventFlags = overrides.eventFlags ?? defaultProfile.eventFlags
  invariant(isRecord(eventFlags), 'eventFlags must be an object.')

  const offset = eventFlags.offset ?? defaultProfile.eventFlags.offset
  const length = eventFlags.length ?? defaultProfile.eventFlags.length
  invariant(
    isNonNegativeInteger(offset),
    'eventFlags.offset must be a non-negative integer.'
  )
  invariant(
    isNonNegativeInteger(length) && length > 0,
    'eventFlags.length must be a positive integer.'
  )

  const name = overrides.name ?? defaultProfile.name
  invariant(typeof name === 'string' && name, 'name must be a string.')

  const digestAlgorithm =
    overrides.digestAlgorithm ?? defaultProfile.digestAlgorithm
  invariant(
    typeof digestAlgorithm === 'string' &&
      getHashes().includes(digestAlgorithm),
    `Unsupported digest algorithm: ${String(digestAlgorithm)}`
  )
  invariant(
    createHash(digestAlgorithm).digest().length === digestSize,
    `Digest algorithm must produce ${digestSize} bytes.`
  )

  const protectedEntryCount =
    overrides.protectedEntryCount ?? defaultProfile.protectedEntryCount
  invariant(
    isNonNegativeInteger(protectedEntryCount) &&
      protectedEntryCount >= slotCount,
    `protectedEntryCount must be an integer of at least ${slotCount}.`
  )

  const bitOrder = overrides.bitOrder ?? defaultProfile.bitOrder
  invariant(isBitOrder(bitOrder), 'bitOrder must be "lsb" or "msb".')

  return {
    name,
    digestAlgorithm,
    protectedEntryCount,
    eventFlags: { offset, length },
    bitOrder
  }
}

/**
 * Load a profile from a JSON file. Missing fields keep their defaults.
 */
export async function loadProfile(filePath: string): Promise<SaveProfile> {
  const content = await readFile(filePath, 'utf-8')
  return resolveProfile(JSON.parse(content))
}
