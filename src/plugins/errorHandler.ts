import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'
import { ENV } from '../config/environment.js'
import { AppError, HttpStatus, ValidationError, type ErrorResponse } from '../types/common.js'

async function errorHandlerPlugin(fastify: FastifyInstance) {
	fastify.setErrorHandler((error, request, reply) => {
		const statusCode = error instanceof AppError
			? error.statusCode
			: error.statusCode ?? HttpStatus.INTERNAL_SERVER_ERROR

		if (statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
			console.error('❌ Unhandled error:', error)
			request.log.error({ err: error }, 'request failed')
		} else {
			request.log.info({ statusCode, err: error.message }, 'request rejected')
		}

		// Don't expose internal errors in production
		const message = statusCode >= HttpStatus.INTERNAL_SERVER_ERROR && ENV.NODE_ENV === 'production'
			? 'Internal Server Error'
			: error.message

		const body: ErrorResponse = {
			success: false,
			error: message,
			statusCode,
			timestamp: new Date().toISOString(),
		}
		if (error instanceof ValidationError) body.errors = error.fields

		reply.status(statusCode).send(body)
	})

	fastify.setNotFoundHandler((request, reply) => {
		const body: ErrorResponse = {
			success: false,
			error: 'Not found.',
			statusCode: HttpStatus.NOT_FOUND,
			timestamp: new Date().toISOString(),
		}
		reply.status(HttpStatus.NOT_FOUND).send(body)
	})
}

export default fp(errorHandlerPlugin, { name: 'error-handler' })
