import type { FastifyRequest } from 'fastify'
import jwt from 'jsonwebtoken'
import { ENV } from '../config/environment.js'
import { sha256 } from './hash.js'
import { isRecord } from './valid.js'

/**
 * JWT helpers
 *
 * Access tokens identify a user by numeric id; role and staff flags are
 * always re-read from the store so that a demotion takes effect at once.
 * Password-reset tokens are bound to a digest of the current password hash
 * and stop verifying as soon as the password changes.
 */

export const TOKEN_COOKIE = 'token'

export interface AccessTokenPayload {
	uid: number
	username: string
}

interface ResetTokenPayload {
	uid: number
	purpose: 'password-reset'
	ph: string
}

const PASSWORD_RESET_TTL_SECONDS = 60 * 60
const DEFAULT_ACCESS_TTL_SECONDS = 30 * 24 * 60 * 60
const UNIT_SECONDS: Record<string, number> = { s: 1, m: 60, h: 60 * 60, d: 24 * 60 * 60 }

function secret(): jwt.Secret {
	if (!ENV.JWT_SECRET) {
		throw new Error('JWT secret is not configured (JWT_SECRET)')
	}
	return ENV.JWT_SECRET
}

/** `3600`, `45m`, `12h` or `30d`; anything else falls back to thirty days. */
export function parseLifetimeSeconds(value: string): number {
	const match = /^(\d+)([smhd]?)$/.exec(value.trim())
	if (!match) return DEFAULT_ACCESS_TTL_SECONDS
	const [, amount = '0', unit = ''] = match
	return Number(amount) * (UNIT_SECONDS[unit] ?? 1)
}

export function signAccessToken(user: { id: number; username: string }): string {
	const payload: AccessTokenPayload = { uid: user.id, username: user.username }
	return jwt.sign(payload, secret(), { expiresIn: parseLifetimeSeconds(ENV.JWT_EXPIRES_IN) })
}

/** @returns the payload, or null for a missing, malformed or expired token */
export function verifyAccessToken(token: string): AccessTokenPayload | null {
	try {
		const payload = jwt.verify(token, secret())
		if (isRecord(payload) && typeof payload.uid === 'number' && typeof payload.username === 'string') {
			return { uid: payload.uid, username: payload.username }
		}
		return null
	} catch (error) {
		console.log('❌ JWT token verification failed:', error instanceof Error ? error.message : 'Unknown error')
		return null
	}
}

/** Bearer header first (API clients), then the session cookie (browsing surface). */
export function extractToken(request: FastifyRequest): string | null {
	const header = request.headers.authorization
	if (header && header.toLowerCase().startsWith('bearer ')) {
		const token = header.slice('bearer '.length).trim()
		return token || null
	}
	const cookie = request.cookies?.[TOKEN_COOKIE]
	return cookie || null
}

function passwordFingerprint(passwordHash: string | null) {
	return sha256(passwordHash ?? '').slice(0, 16)
}

export function signPasswordResetToken(user: { id: number; passwordHash: string | null }): string {
	const payload: ResetTokenPayload = { uid: user.id, purpose: 'password-reset', ph: passwordFingerprint(user.passwordHash) }
	return jwt.sign(payload, secret(), { expiresIn: PASSWORD_RESET_TTL_SECONDS })
}

export function verifyPasswordResetToken(token: string, user: { id: number; passwordHash: string | null }): boolean {
	try {
		const payload = jwt.verify(token, secret())
		return isRecord(payload)
			&& payload.purpose === 'password-reset'
			&& payload.uid === user.id
			&& payload.ph === passwordFingerprint(user.passwordHash)
	} catch {
		return false
	}
}
