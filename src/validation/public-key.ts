/**
 * RSA public key structural validation.
 *
 * Accepts a PEM `PUBLIC KEY` block or the bare base64 of its DER bytes
 * (SubjectPublicKeyInfo), and reports the modulus size.
 *
 * The size is the modulus byte length times 8, so it has byte
 * granularity: a 2041-bit modulus occupying 256 bytes reports 2048.
 *
 * @module validation/public-key
 */

import { createPublicKey, type KeyObject } from 'node:crypto'
import { getValidatorLogger } from '../logging/index.ts'
import { isBase64 } from './patterns.ts'

const logger = getValidatorLogger('keys')

/** BEGIN marker must start a line */
const PEM_BLOCK = /(?:^|\n)-----BEGIN ([^\r\n]+?)-----([\s\S]*?)-----END \1-----/

/**
 * Facts read from a decoded RSA public key.
 */
export interface PublicKeyInfo {
	/** Modulus length in bytes, leading zero bytes excluded */
	modulusBytes: number
	/** `modulusBytes * 8` */
	bits: number
	/** Whether the key came from a PEM block or bare base64 DER */
	encoding: 'pem' | 'base64-der'
}

interface PemBlock {
	type: string
	bytes: Buffer
}

/**
 * Find the first PEM block in text. Header lines (`Key: value`) are skipped.
 * A block whose body is not base64 is treated as absent.
 */
function decodePem(text: string): PemBlock | null {
	const match = PEM_BLOCK.exec(text)
	if (!match) return null

	const [, type = '', rawBody = ''] = match
	const body = rawBody
		.split(/\r?\n/)
		.filter((line) => !line.includes(':'))
		.join('')
		.replace(/\s+/g, '')
	if (body !== '' && !isBase64(body)) return null

	return { type, bytes: Buffer.from(body, 'base64') }
}

/**
 * Parse SubjectPublicKeyInfo DER. The bytes must be exactly one encoded
 * structure: trailing data is rejected.
 */
function parseSpki(der: Buffer): KeyObject | null {
	try {
		const key = createPublicKey({ key: der, format: 'der', type: 'spki' })
		if (!key.export({ type: 'spki', format: 'der' }).equals(der)) {
			logger.debug('Public key rejected: trailing or non-canonical DER', {
				length: der.length,
			})
			return null
		}
		return key
	} catch (error: unknown) {
		logger.debug('Public key rejected: not SubjectPublicKeyInfo', {
			reason: error instanceof Error ? error.message : String(error),
		})
		return null
	}
}

/**
 * Decode an RSA public key and report its modulus size.
 *
 * @param text - PEM text, or base64 of the DER bytes
 * @returns Key facts, or null if the text is not an RSA public key
 *
 * @example
 * ```typescript
 * inspectPublicKey(pem2048)
 * // => { modulusBytes: 256, bits: 2048, encoding: "pem" }
 *
 * inspectPublicKey("-----BEGIN RSA PUBLIC KEY-----...") // => null
 * ```
 */
export function inspectPublicKey(text: string): PublicKeyInfo | null {
	const block = decodePem(text)
	if (block && block.type !== 'PUBLIC KEY') {
		logger.debug('Public key rejected: wrong PEM type', { type: block.type })
		return null
	}

	let der: Buffer
	if (block) {
		der = block.bytes
	} else {
		const compact = text.replace(/[\r\n]/g, '')
		if (!isBase64(compact)) {
			logger.debug('Public key rejected: neither PEM nor base64')
			return null
		}
		der = Buffer.from(compact, 'base64')
	}

	const key = parseSpki(der)
	if (!key) return null
	if (key.asymmetricKeyType !== 'rsa') {
		logger.debug('Public key rejected: not RSA', { type: key.asymmetricKeyType })
		return null
	}

	const { n } = key.export({ format: 'jwk' })
	if (n === undefined) return null

	// JWK "n" is the unsigned big-endian modulus without leading zero bytes.
	const modulusBytes = Buffer.from(n, 'base64url').length
	return {
		modulusBytes,
		bits: modulusBytes * 8,
		encoding: block ? 'pem' : 'base64-der',
	}
}

/**
 * Check if text is an RSA public key of the expected size.
 *
 * @param text - PEM `PUBLIC KEY` text, or base64 of the DER bytes
 * @param expectedBits - Required modulus size (compared at byte granularity)
 * @returns True if the key is RSA and its modulus occupies `expectedBits / 8` bytes
 *
 * @example
 * ```typescript
 * isRsaPublicKey(pem2048, 2048) // => true
 * isRsaPublicKey(pem2048, 4096) // => false
 * ```
 */
export function isRsaPublicKey(text: string, expectedBits: number): boolean {
	const info = inspectPublicKey(text)
	return info !== null && info.bits === expectedBits
}
