import { Schema, model, type InferSchemaType } from 'mongoose'
import { ROLES } from '../../types/models.js'

const UserSchema = new Schema({
	userId: { type: Number, index: true, unique: true, required: true },
	username: { type: String, index: true, unique: true, required: true, maxlength: 150 },
	email: { type: String, index: true, unique: true, required: true, maxlength: 254 },
	firstName: { type: String, default: '', maxlength: 150 },
	lastName: { type: String, default: '', maxlength: 150 },
	bio: { type: String, default: null },
	role: { type: String, enum: ROLES, default: 'user', required: true },
	isStaff: { type: Boolean, default: false },

	// signup confirmation & browsing-surface credentials
	confirmationCode: { type: String, default: null, maxlength: 12 },
	password: { type: String, default: null },
}, { timestamps: true, versionKey: false, collection: 'users' })

UserSchema.index({ role: 1 })
UserSchema.index({ createdAt: -1 })

export type UserDocument = InferSchemaType<typeof UserSchema>
export const UserModel = model('User', UserSchema)
