import { z } from 'zod'
import { email, messages, score, text, username } from '../api/serializers/fields.js'

/** Browsing-surface forms, posted urlencoded or as JSON. */

const password = () => z.string({ required_error: messages.required, invalid_type_error: messages.string })
	.min(8, 'This password is too short. It must contain at least 8 characters.')

const PASSWORD_MISMATCH = 'The two password fields didn’t match.'

export const reviewForm = z.object({
	text: text(),
	score: score(),
})

export const commentForm = z.object({
	text: text(),
})

export const signUpForm = z.object({
	username: username(),
	email: email(),
	password1: password(),
	password2: z.string({ required_error: messages.required }),
}).refine(form => form.password1 === form.password2, { message: PASSWORD_MISMATCH, path: ['password2'] })

export const loginForm = z.object({
	username: text(150),
	password: z.string({ required_error: messages.required }).min(1, messages.blank),
})

export const passwordResetForm = z.object({
	email: email(),
})

export const setPasswordForm = z.object({
	new_password1: password(),
	new_password2: z.string({ required_error: messages.required }),
}).refine(form => form.new_password1 === form.new_password2, { message: PASSWORD_MISMATCH, path: ['new_password2'] })

export const passwordChangeForm = z.object({
	old_password: z.string({ required_error: messages.required }).min(1, messages.blank),
	new_password1: password(),
	new_password2: z.string({ required_error: messages.required }),
}).refine(form => form.new_password1 === form.new_password2, { message: PASSWORD_MISMATCH, path: ['new_password2'] })
