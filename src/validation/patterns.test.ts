import { describe, expect, test } from 'vitest'
import { isBase64, matchesPattern } from './patterns.ts'

describe('validation/patterns', () => {
	describe('identityNumber rule', () => {
		test('accepts 15 and 18 character numbers', () => {
			expect(matchesPattern('identityNumber', '440301850101123')).toBe(true)
			expect(matchesPattern('identityNumber', '11010519491231002X')).toBe(true)
			expect(matchesPattern('identityNumber', '11010519491231002x')).toBe(true)
			expect(matchesPattern('identityNumber', '440301198501011236')).toBe(true)
		})

		test('rejects other lengths and characters', () => {
			expect(matchesPattern('identityNumber', '4403018501011')).toBe(false)
			expect(matchesPattern('identityNumber', '4403011985010112361')).toBe(false)
			expect(matchesPattern('identityNumber', '44030185010112X')).toBe(false)
			expect(matchesPattern('identityNumber', '1101051949123100X2')).toBe(false)
			expect(matchesPattern('identityNumber', '')).toBe(false)
		})
	})

	describe('dateTime rule', () => {
		test('accepts every granularity', () => {
			for (const text of [
				'2024',
				'2024-03',
				'2024-03-05',
				'2024-03-05 10',
				'2024-03-05 10:30',
				'2024-03-05 10:30:15',
			]) {
				expect(matchesPattern('dateTime', text)).toBe(true)
			}
		})

		test('rejects other shapes', () => {
			expect(matchesPattern('dateTime', '24-03-05')).toBe(false)
			expect(matchesPattern('dateTime', '2024-3-5')).toBe(false)
			expect(matchesPattern('dateTime', '2024/03/05')).toBe(false)
			expect(matchesPattern('dateTime', '2024-03-05T10:30')).toBe(false)
			expect(matchesPattern('dateTime', '2024-03-05 10:30:15.123')).toBe(false)
		})
	})

	describe('isBase64', () => {
		test('accepts padded base64', () => {
			expect(isBase64('aGVsbG8=')).toBe(true)
			expect(isBase64('aGk=')).toBe(true)
			expect(isBase64('YQ==')).toBe(true)
			expect(isBase64('YWJj')).toBe(true)
		})

		test('rejects empty, unpadded and url-safe text', () => {
			expect(isBase64('')).toBe(false)
			expect(isBase64('aGVsbG8')).toBe(false)
			expect(isBase64('a-_b')).toBe(false)
			expect(isBase64('not base64!')).toBe(false)
		})
	})
})
