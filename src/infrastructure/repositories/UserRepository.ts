import { UserModel } from '../models/User.js'
import { getNextSequence } from '../models/Sequence.js'
import { ROLES, type NewUser, type Role, type User, type UserPatch } from '../../types/models.js'
import type { Listing } from '../../common/pagination.js'
import { containsInsensitive } from '../../common/regex.js'
import type { UserRepository } from './types.js'

interface UserRow {
	userId: number
	username: string
	email: string
	firstName?: string | null
	lastName?: string | null
	bio?: string | null
	role: string
	isStaff?: boolean | null
	confirmationCode?: string | null
	password?: string | null
	createdAt?: Date
}

function toRole(value: string): Role {
	return ROLES.find(role => role === value) ?? 'user'
}

function toUser(row: UserRow): User {
	return {
		id: row.userId,
		username: row.username,
		email: row.email,
		firstName: row.firstName ?? '',
		lastName: row.lastName ?? '',
		bio: row.bio ?? null,
		role: toRole(row.role),
		isStaff: row.isStaff ?? false,
		confirmationCode: row.confirmationCode ?? null,
		passwordHash: row.password ?? null,
		dateJoined: row.createdAt ?? new Date(0),
	}
}

function toUpdate(patch: UserPatch) {
	const update: Record<string, unknown> = {}
	if (patch.username !== undefined) update.username = patch.username
	if (patch.email !== undefined) update.email = patch.email
	if (patch.firstName !== undefined) update.firstName = patch.firstName
	if (patch.lastName !== undefined) update.lastName = patch.lastName
	if (patch.bio !== undefined) update.bio = patch.bio
	if (patch.role !== undefined) update.role = patch.role
	if (patch.confirmationCode !== undefined) update.confirmationCode = patch.confirmationCode
	if (patch.passwordHash !== undefined) update.password = patch.passwordHash
	return update
}

export class MongoUserRepository implements UserRepository {
	list(search?: string): Listing<User> {
		const filter = search ? { username: containsInsensitive(search) } : {}
		return {
			count: () => UserModel.countDocuments(filter),
			slice: async (offset, limit) => {
				const rows = await UserModel.find(filter).sort({ userId: 1 }).skip(offset).limit(limit).lean<UserRow[]>()
				return rows.map(toUser)
			},
		}
	}

	async findById(id: number) {
		const row = await UserModel.findOne({ userId: id }).lean<UserRow>()
		return row ? toUser(row) : null
	}

	async findByUsername(username: string) {
		const row = await UserModel.findOne({ username }).lean<UserRow>()
		return row ? toUser(row) : null
	}

	async findByEmail(email: string) {
		const row = await UserModel.findOne({ email }).lean<UserRow>()
		return row ? toUser(row) : null
	}

	async create(data: NewUser) {
		const userId = await getNextSequence('userId')
		const doc = await UserModel.create({
			userId,
			username: data.username,
			email: data.email,
			firstName: data.firstName ?? '',
			lastName: data.lastName ?? '',
			bio: data.bio ?? null,
			role: data.role ?? 'user',
			isStaff: data.isStaff ?? false,
			confirmationCode: data.confirmationCode ?? null,
			password: data.passwordHash ?? null,
		})
		return toUser(doc.toObject<UserRow>())
	}

	async update(id: number, patch: UserPatch) {
		const row = await UserModel.findOneAndUpdate(
			{ userId: id },
			{ $set: toUpdate(patch) },
			{ new: true, runValidators: true }
		).lean<UserRow>()
		return row ? toUser(row) : null
	}

	async delete(id: number) {
		const result = await UserModel.deleteOne({ userId: id })
		return result.deletedCount > 0
	}
}
