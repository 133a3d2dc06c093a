import type { FastifyRequest } from 'fastify'
import { NotFoundError } from '../types/common.js'
import { isRecord } from '../common/valid.js'

function rawParam(request: FastifyRequest, name: string): unknown {
	return isRecord(request.params) ? request.params[name] : undefined
}

/** Numeric path segment such as `:titleId`; anything else cannot name a record. */
export function idParam(request: FastifyRequest, name: string): number {
	const value = rawParam(request, name)
	if (typeof value !== 'string' || !/^\d+$/.test(value)) throw new NotFoundError()
	return Number(value)
}

export function stringParam(request: FastifyRequest, name: string): string {
	const value = rawParam(request, name)
	if (typeof value !== 'string' || value === '') throw new NotFoundError()
	return value
}

export function queryValue(request: FastifyRequest, name: string): string | undefined {
	if (!isRecord(request.query)) return undefined
	const value = request.query[name]
	return typeof value === 'string' ? value : undefined
}

export function absoluteUrl(request: FastifyRequest): URL {
	return new URL(request.url, `${request.protocol}://${request.hostname}`)
}
