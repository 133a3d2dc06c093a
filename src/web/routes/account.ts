import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify'
import { ENV } from '../../config/environment.js'
import { TOKEN_COOKIE, parseLifetimeSeconds } from '../../common/jwtAuth.js'
import { requireUser } from '../../plugins/permissions.js'
import { stringParam } from '../../api/request.js'
import { parse } from '../../api/serializers/fields.js'
import { HOME_URL } from '../actions.js'
import { loginForm, passwordChangeForm, passwordResetForm, setPasswordForm, signUpForm } from '../forms.js'

const DONE_PAGES = {
	'/auth/password_reset/done': 'We have emailed you instructions for setting your password.',
	'/auth/reset/done': 'Your password has been set. You may go ahead and log in now.',
	'/auth/password_change/done': 'Your password was changed.',
} as const

export default async function accountRoutes(fastify: FastifyInstance) {
	fastify.post('/auth/signup', async (request: FastifyRequest, reply: FastifyReply) => {
		const form = parse(signUpForm, request.body)
		await request.server.services.auth.register({ username: form.username, email: form.email, password: form.password1 })
		return reply.redirect(HOME_URL)
	})

	fastify.post('/auth/login', async (request: FastifyRequest, reply: FastifyReply) => {
		const form = parse(loginForm, request.body)
		const { token } = await request.server.services.auth.login(form.username, form.password)
		reply.setCookie(TOKEN_COOKIE, token, {
			path: '/',
			httpOnly: true,
			sameSite: 'lax',
			secure: ENV.NODE_ENV === 'production',
			maxAge: parseLifetimeSeconds(ENV.JWT_EXPIRES_IN),
		})
		return reply.redirect(HOME_URL)
	})

	fastify.post('/auth/logout', async (request: FastifyRequest, reply: FastifyReply) => {
		reply.clearCookie(TOKEN_COOKIE, { path: '/' })
		return reply.redirect(HOME_URL)
	})

	fastify.post('/auth/password_reset', async (request: FastifyRequest, reply: FastifyReply) => {
		const { email } = parse(passwordResetForm, request.body)
		await request.server.services.auth.requestPasswordReset(email)
		return reply.redirect('/auth/password_reset/done')
	})

	fastify.post('/auth/reset/:uid/:token', async (request: FastifyRequest, reply: FastifyReply) => {
		const form = parse(setPasswordForm, request.body)
		await request.server.services.auth.resetPassword(
			stringParam(request, 'uid'),
			stringParam(request, 'token'),
			form.new_password1,
		)
		return reply.redirect('/auth/reset/done')
	})

	fastify.post('/auth/password_change', async (request: FastifyRequest, reply: FastifyReply) => {
		const user = requireUser(request)
		const form = parse(passwordChangeForm, request.body)
		await request.server.services.auth.changePassword(user, form.old_password, form.new_password1)
		return reply.redirect('/auth/password_change/done')
	})

	for (const [url, detail] of Object.entries(DONE_PAGES)) {
		fastify.get(url, async () => ({ detail }))
	}
}
