import { z } from 'zod'
import { ROLES, type User } from '../../types/models.js'
import type { UserInput } from '../../services/UserService.js'
import { email, messages, optionalText, username } from './fields.js'

const userFields = z.object({
	username: username(),
	email: email(),
	first_name: optionalText(150).optional(),
	last_name: optionalText(150).optional(),
	bio: z.string({ invalid_type_error: messages.string }).nullable().optional(),
	role: z.enum(ROLES, {
		errorMap: () => ({ message: `Must be one of: ${ROLES.join(', ')}.` }),
	}).optional(),
})

type UserFields = z.infer<typeof userFields>

function toUserInput<T extends Partial<UserFields>>(fields: T) {
	const input: Partial<UserInput> = {}
	if (fields.username !== undefined) input.username = fields.username
	if (fields.email !== undefined) input.email = fields.email
	if (fields.first_name !== undefined) input.firstName = fields.first_name
	if (fields.last_name !== undefined) input.lastName = fields.last_name
	if (fields.bio !== undefined) input.bio = fields.bio
	if (fields.role !== undefined) input.role = fields.role
	return input
}

export const userCreateSchema = userFields.transform((fields): UserInput => ({
	...toUserInput(fields),
	username: fields.username,
	email: fields.email,
}))

export const userPatchSchema = userFields.partial().transform(toUserInput)

/** `role` is not a writable field of one's own profile and is dropped here. */
export const profilePatchSchema = userFields.omit({ role: true }).partial().transform(toUserInput)

export const signUpSchema = z.object({
	email: email(),
	username: username(),
})

export const tokenSchema = z.object({
	username: z.string({ required_error: messages.required, invalid_type_error: messages.string }).max(150),
	confirmation_code: z.string({ required_error: messages.required, invalid_type_error: messages.string }),
})

export const userQuerySchema = z.object({
	search: z.string().optional(),
	page: z.string().optional(),
})

export function userRepresentation(user: User) {
	return {
		username: user.username,
		email: user.email,
		first_name: user.firstName,
		last_name: user.lastName,
		bio: user.bio,
		role: user.role,
	}
}
