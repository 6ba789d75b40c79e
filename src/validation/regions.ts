/**
 * Region code table for identity numbers.
 *
 * The first two digits of an identity number name the province-level
 * region that issued it. The table is loaded from `regions.json` once,
 * checked, and frozen.
 *
 * @module validation/regions
 */

import { z } from 'zod'
import regionData from './regions.json'

const regionTableSchema = z.record(
	z.string().regex(/^\d{2}$/, 'Region code must be two digits'),
	z.string().min(1),
)

/**
 * Read-only map from 2-digit region code to region name.
 *
 * Entries live in a private Map; the table exposes no mutators and the
 * instance itself is frozen.
 */
export class RegionCodeTable implements ReadonlyMap<string, string> {
	readonly #regions: Map<string, string>

	constructor(entries: Iterable<readonly [string, string]>) {
		this.#regions = new Map(entries)
		Object.freeze(this)
	}

	get size(): number {
		return this.#regions.size
	}

	get(code: string): string | undefined {
		return this.#regions.get(code)
	}

	has(code: string): boolean {
		return this.#regions.has(code)
	}

	forEach(callback: (name: string, code: string, table: ReadonlyMap<string, string>) => void): void {
		for (const [code, name] of this.#regions) {
			callback(name, code, this)
		}
	}

	entries() {
		return this.#regions.entries()
	}

	keys() {
		return this.#regions.keys()
	}

	values() {
		return this.#regions.values()
	}

	[Symbol.iterator]() {
		return this.#regions[Symbol.iterator]()
	}
}

/**
 * Build a read-only region table from raw data.
 *
 * @param data - Object keyed by 2-digit region code
 * @returns Read-only region table
 * @throws ZodError if a key is not two digits or a name is empty
 */
export function createRegionTable(data: unknown): RegionCodeTable {
	return new RegionCodeTable(Object.entries(regionTableSchema.parse(data)))
}

/** Regions issuing resident identity numbers */
export const REGION_CODES: RegionCodeTable = createRegionTable(regionData)

/**
 * Look up the region name for the first two characters of a number.
 *
 * @example
 * ```typescript
 * regionOf("440301198501011236") // => "Guangdong"
 * regionOf("000000") // => undefined
 * ```
 */
export function regionOf(
	text: string,
	table: RegionCodeTable = REGION_CODES,
): string | undefined {
	return table.get(text.slice(0, 2))
}
