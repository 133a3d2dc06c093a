import type { FastifyInstance } from 'fastify'
import { AuthController } from '../controllers/AuthController.js'

export default async function authRoutes(fastify: FastifyInstance) {
	fastify.post('/auth/signup', AuthController.signUp)
	fastify.post('/auth/token', AuthController.token)
}
