import type { FastifyReply, FastifyRequest } from 'fastify'
import type { z } from 'zod'
import type { Authored, User } from '../types/models.js'
import { NotFoundError, ValidationError } from '../types/common.js'
import { assertCanModify } from '../common/permissions.js'
import { requireUser } from '../plugins/permissions.js'

export const HOME_URL = '/'

/**
 * Form post that creates a child record (a review under a title, a comment
 * under a review). A form that does not validate, or that the service
 * rejects, sends the visitor home without saving anything.
 */
export interface CreateActionConfig<P, D> {
	resolveParent(request: FastifyRequest): Promise<P | null>
	formSchema: z.ZodType<D, z.ZodTypeDef, unknown>
	create(request: FastifyRequest, parent: P, author: User, data: D): Promise<unknown>
	successUrl(parent: P): string
}

export function createAction<P, D>(config: CreateActionConfig<P, D>) {
	return async (request: FastifyRequest, reply: FastifyReply) => {
		const author = requireUser(request)
		const parent = await config.resolveParent(request)
		if (parent === null) throw new NotFoundError()

		const form = config.formSchema.safeParse(request.body ?? {})
		if (!form.success) return reply.redirect(HOME_URL)

		try {
			await config.create(request, parent, author, form.data)
		} catch (error) {
			if (error instanceof ValidationError) {
				request.log.info({ errors: error.fields }, 'create rejected')
				return reply.redirect(HOME_URL)
			}
			throw error
		}
		return reply.redirect(config.successUrl(parent))
	}
}

/** Immediate, permanent removal by the author or a privileged role. */
export interface DeleteActionConfig<T extends Authored> {
	resolveTarget(request: FastifyRequest): Promise<T | null>
	remove(request: FastifyRequest, target: T): Promise<void>
	successUrl(target: T): string
}

export function deleteAction<T extends Authored>(config: DeleteActionConfig<T>) {
	return async (request: FastifyRequest, reply: FastifyReply) => {
		const user = requireUser(request)
		const target = await config.resolveTarget(request)
		if (target === null) throw new NotFoundError()
		assertCanModify(user, target)
		await config.remove(request, target)
		return reply.redirect(config.successUrl(target))
	}
}
