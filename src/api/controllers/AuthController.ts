import type { FastifyRequest } from 'fastify'
import { parse } from '../serializers/fields.js'
import { signUpSchema, tokenSchema } from '../serializers/users.js'

export const AuthController = {
	signUp: async (request: FastifyRequest) => {
		const input = parse(signUpSchema, request.body)
		return request.server.services.auth.signUp(input)
	},

	token: async (request: FastifyRequest) => {
		const { username, confirmation_code } = parse(tokenSchema, request.body)
		return request.server.services.auth.issueToken(username, confirmation_code)
	},
}
