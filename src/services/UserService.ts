import type { Repositories } from '../infrastructure/repositories/index.js'
import type { Listing } from '../common/pagination.js'
import type { Role, User, UserPatch } from '../types/models.js'
import { NotFoundError, ValidationError, type FieldErrors } from '../types/common.js'
import { purgeAuthor } from './cascade.js'

export interface UserInput {
	username: string
	email: string
	firstName?: string
	lastName?: string
	bio?: string | null
	role?: Role
}

export type ProfilePatch = Omit<Partial<UserInput>, 'role'>

export const USERNAME_TAKEN = 'A user with that username already exists.'
export const EMAIL_TAKEN = 'user with this email already exists.'

export class UserService {
	constructor(private readonly repositories: Repositories) {}

	list(search?: string): Listing<User> {
		return this.repositories.users.list(search)
	}

	/** Token holders whose account has since been removed resolve to null. */
	findById(id: number): Promise<User | null> {
		return this.repositories.users.findById(id)
	}

	findByUsername(username: string): Promise<User | null> {
		return this.repositories.users.findByUsername(username)
	}

	async getByUsername(username: string): Promise<User> {
		const user = await this.findByUsername(username)
		if (!user) throw new NotFoundError()
		return user
	}

	async create(input: UserInput): Promise<User> {
		await this.assertUnique(input)
		const user = await this.repositories.users.create({ ...input, role: input.role ?? 'user' })
		console.log(`✅ Created user ${user.id} "${user.username}"`)
		return user
	}

	async update(username: string, patch: Partial<UserInput>): Promise<User> {
		const user = await this.getByUsername(username)
		return this.applyPatch(user, patch)
	}

	/** Self-service edits never change the role, whatever the client sends. */
	async updateProfile(user: User, patch: ProfilePatch): Promise<User> {
		const changes: UserPatch = {}
		if (patch.username !== undefined) changes.username = patch.username
		if (patch.email !== undefined) changes.email = patch.email
		if (patch.firstName !== undefined) changes.firstName = patch.firstName
		if (patch.lastName !== undefined) changes.lastName = patch.lastName
		if (patch.bio !== undefined) changes.bio = patch.bio
		return this.applyPatch(user, changes)
	}

	async destroy(username: string): Promise<void> {
		const user = await this.getByUsername(username)
		await purgeAuthor(this.repositories, user.id)
		await this.repositories.users.delete(user.id)
		console.log(`🗑️ Deleted user "${username}" with their reviews and comments`)
	}

	private async applyPatch(user: User, patch: UserPatch): Promise<User> {
		await this.assertUnique(patch, user.id)
		const updated = await this.repositories.users.update(user.id, patch)
		if (!updated) throw new NotFoundError()
		return updated
	}

	private async assertUnique(fields: { username?: string; email?: string }, selfId?: number) {
		const errors: FieldErrors = {}
		if (fields.username !== undefined) {
			const holder = await this.repositories.users.findByUsername(fields.username)
			if (holder && holder.id !== selfId) errors.username = [USERNAME_TAKEN]
		}
		if (fields.email !== undefined) {
			const holder = await this.repositories.users.findByEmail(fields.email)
			if (holder && holder.id !== selfId) errors.email = [EMAIL_TAKEN]
		}
		if (Object.keys(errors).length > 0) throw new ValidationError(errors)
	}
}
