import { Schema, model, type InferSchemaType } from 'mongoose'
import { isPastOrCurrentYear } from '../../common/valid.js'

const TitleSchema = new Schema({
	titleId: { type: Number, required: true, unique: true, index: true },
	name: { type: String, required: true, index: true, maxlength: 256 },
	year: {
		type: Number,
		required: true,
		index: true,
		validate: {
			validator: (value: number) => isPastOrCurrentYear(value),
			message: 'Year cannot be in the future.',
		},
	},
	categoryId: { type: Number, required: true, index: true },
	description: { type: String, default: null }
}, { timestamps: true, versionKey: false, collection: 'titles' })

// Default listing order
TitleSchema.index({ year: -1, titleId: 1 })
TitleSchema.index({ categoryId: 1, year: -1 })

export type TitleDocument = InferSchemaType<typeof TitleSchema>
export const TitleModel = model('Title', TitleSchema)
