import { z, type ZodError, type ZodTypeAny } from 'zod'
import { NON_FIELD_ERRORS, ValidationError, type FieldErrors } from '../../types/common.js'
import { RESERVED_USERNAME, SLUG_PATTERN, USERNAME_PATTERN, isPastOrCurrentYear } from '../../common/valid.js'

export const messages = {
	required: 'This field is required.',
	string: 'Not a valid string.',
	integer: 'A valid integer is required.',
	blank: 'This field may not be blank.',
} as const

export function fieldErrorsFromZod(error: ZodError): FieldErrors {
	const fields: FieldErrors = {}
	for (const issue of error.issues) {
		const [head] = issue.path
		const key = typeof head === 'string' ? head : NON_FIELD_ERRORS
		const list = fields[key] ?? []
		list.push(issue.message)
		fields[key] = list
	}
	return fields
}

/** Validate untrusted input; any failure becomes a 400 with per-field messages. */
export function parse<S extends ZodTypeAny>(schema: S, input: unknown): z.output<S> {
	const result = schema.safeParse(input ?? {})
	if (!result.success) {
		throw new ValidationError(fieldErrorsFromZod(result.error))
	}
	return result.data
}

export function text(max?: number) {
	const base = z.string({ required_error: messages.required, invalid_type_error: messages.string })
		.trim()
		.min(1, messages.blank)
	return max === undefined ? base : base.max(max, `Ensure this field has no more than ${max} characters.`)
}

export function optionalText(max: number) {
	return z.string({ invalid_type_error: messages.string })
		.trim()
		.max(max, `Ensure this field has no more than ${max} characters.`)
}

/** Integers arrive as JSON numbers or, from HTML forms, as digit strings. */
export function integer() {
	return z.preprocess(
		value => (typeof value === 'string' && /^-?\d+$/.test(value.trim()) ? Number(value) : value),
		z.number({ required_error: messages.required, invalid_type_error: messages.integer })
			.int(messages.integer)
	)
}

export function score() {
	return integer().pipe(
		z.number()
			.min(0, 'Ensure this value is greater than or equal to 0.')
			.max(10, 'Ensure this value is less than or equal to 10.')
	)
}

export function year() {
	return integer().pipe(
		z.number().refine(value => isPastOrCurrentYear(value), 'Year cannot be in the future.')
	)
}

export function slug() {
	return text(50).regex(SLUG_PATTERN, 'Enter a valid "slug" consisting of letters, numbers, underscores or hyphens.')
}

export function username() {
	return text(150)
		.regex(USERNAME_PATTERN, 'Enter a valid username. This value may contain only letters, numbers, and @/./+/-/_ characters.')
		.refine(value => value !== RESERVED_USERNAME, `Username "${RESERVED_USERNAME}" is not allowed.`)
}

export function email() {
	return text(254).email('Enter a valid email address.')
}
