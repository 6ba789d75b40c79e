import { describe, expect, test } from 'vitest'
import { isValidationError, ValidationError } from '../errors/index.ts'
import {
	assertIdentityNumber,
	identityChecksum,
	isIdentityNumber,
	validateIdentityNumber,
} from './identity.ts'
import { createRegionTable } from './regions.ts'

const options = {
	timeZone: 'utc',
	now: () => Date.UTC(2026, 0, 1),
} as const

describe('validation/identity', () => {
	describe('identityChecksum', () => {
		test('computes the weighted mod-11 checksum', () => {
			expect(identityChecksum('11010519491231002')).toBe('X')
			expect(identityChecksum('44030119850101123')).toBe('6')
			expect(identityChecksum('11010518050101996')).toBe('X')
		})

		test('reads only the first 17 digits', () => {
			expect(identityChecksum('11010519491231002X')).toBe('X')
		})

		test('is deterministic', () => {
			const prefix = '44030119850101123'
			expect(identityChecksum(prefix)).toBe(identityChecksum(prefix))
		})

		test('rejects non-digit input', () => {
			expect(() => identityChecksum('1101051949123100')).toThrow(ValidationError)
			expect(() => identityChecksum('1101051949123100A')).toThrow('17 leading digits')
		})
	})

	describe('validateIdentityNumber', () => {
		test('returns full-length numbers unchanged', () => {
			expect(validateIdentityNumber('11010519491231002X', options)).toEqual({
				valid: true,
				value: '11010519491231002X',
			})
			expect(validateIdentityNumber('440301198501011236', options)).toEqual({
				valid: true,
				value: '440301198501011236',
			})
		})

		test('upper-cases a trailing x', () => {
			expect(validateIdentityNumber('11010519491231002x', options)).toEqual({
				valid: true,
				value: '11010519491231002X',
			})
		})

		test('upgrades legacy numbers to the 1900s', () => {
			const result = validateIdentityNumber('440301850101123', options)
			expect(result).toEqual({ valid: true, value: '440301198501011236' })
			expect(validateIdentityNumber('440301198501011236', options).valid).toBe(true)
		})

		test('upgrades reserved legacy sequences to the 1800s', () => {
			expect(validateIdentityNumber('110105050101996', options)).toEqual({
				valid: true,
				value: '11010518050101996X',
			})
		})

		test('rejects empty input', () => {
			expect(validateIdentityNumber('', options)).toEqual({
				valid: false,
				error: 'Identity number cannot be empty',
				issue: { kind: 'FORMAT', code: 'EMPTY_INPUT' },
			})
		})

		test('rejects malformed input', () => {
			for (const text of ['4403018501011', '44030119850101123A', '4403011985010112361', 'abc']) {
				const result = validateIdentityNumber(text, options)
				expect(result.valid).toBe(false)
				expect(result.value).toBeUndefined()
				expect(result.issue).toEqual({ kind: 'FORMAT', code: 'MALFORMED' })
			}
		})

		test('rejects unknown region prefixes', () => {
			expect(validateIdentityNumber('000105194912310021', options)).toEqual({
				valid: false,
				error: 'Unknown region code: 00',
				issue: { kind: 'SEMANTIC', code: 'UNKNOWN_REGION' },
			})
			expect(validateIdentityNumber('990301850101123', options).issue?.code).toBe(
				'UNKNOWN_REGION',
			)
		})

		test('rejects impossible birthdates', () => {
			expect(validateIdentityNumber('110105194902300012', options)).toEqual({
				valid: false,
				error: 'Invalid birthdate: 1949-02-30',
				issue: { kind: 'SEMANTIC', code: 'INVALID_BIRTHDATE' },
			})
			expect(validateIdentityNumber('110105491331001', options).issue?.code).toBe(
				'INVALID_BIRTHDATE',
			)
		})

		test('rejects birthdates that are not in the past', () => {
			expect(validateIdentityNumber('110105203001010013', options)).toEqual({
				valid: false,
				error: 'Birthdate is not in the past: 2030-01-01',
				issue: { kind: 'SEMANTIC', code: 'FUTURE_BIRTHDATE' },
			})

			const bornNow = { timeZone: 'utc', now: () => Date.UTC(1949, 11, 31) } as const
			expect(validateIdentityNumber('11010519491231002X', bornNow).issue?.code).toBe(
				'FUTURE_BIRTHDATE',
			)
		})

		test('rejects checksum mismatches', () => {
			expect(validateIdentityNumber('110105194912310021', options)).toEqual({
				valid: false,
				error: 'Checksum mismatch: expected X, got 1',
				issue: { kind: 'INTEGRITY', code: 'CHECKSUM_MISMATCH' },
			})
		})

		test('checks regions against a supplied table', () => {
			const regions = createRegionTable({ '44': 'Guangdong' })
			expect(validateIdentityNumber('440301198501011236', { ...options, regions }).valid).toBe(
				true,
			)
			expect(validateIdentityNumber('11010519491231002X', { ...options, regions }).valid).toBe(
				false,
			)
		})

		test('uses the real clock by default', () => {
			expect(validateIdentityNumber('11010519491231002X').valid).toBe(true)
		})

		test('keeps results isolated under concurrent callers', async () => {
			const inputs = [
				'11010519491231002X',
				'440301850101123',
				'110105194912310021',
				'110105050101996',
				'000105194912310021',
			]
			const batches = await Promise.all(
				Array.from({ length: 20 }, async () =>
					inputs.map((text) => validateIdentityNumber(text, options).value ?? ''),
				),
			)
			for (const batch of batches) {
				expect(batch).toEqual([
					'11010519491231002X',
					'440301198501011236',
					'',
					'11010518050101996X',
					'',
				])
			}
		})
	})

	describe('isIdentityNumber', () => {
		test('returns the validity flag', () => {
			expect(isIdentityNumber('440301850101123', options)).toBe(true)
			expect(isIdentityNumber('110105194912310021', options)).toBe(false)
		})
	})

	describe('assertIdentityNumber', () => {
		test('returns the canonical number', () => {
			expect(assertIdentityNumber('440301850101123', options)).toBe('440301198501011236')
		})

		test('throws a classified ValidationError', () => {
			try {
				assertIdentityNumber('110105194912310021', options)
				expect.unreachable()
			} catch (error) {
				expect(isValidationError(error)).toBe(true)
				if (isValidationError(error)) {
					expect(error.kind).toBe('INTEGRITY')
					expect(error.code).toBe('CHECKSUM_MISMATCH')
					expect(error.context).toEqual({ length: 18 })
				}
			}
		})
	})
})
