import { Schema, model, type InferSchemaType } from 'mongoose'

const GenreTitleSchema = new Schema({
	genreId: { type: Number, required: true, index: true },
	titleId: { type: Number, required: true, index: true }
}, { timestamps: true, versionKey: false, collection: 'genre-titles' })

GenreTitleSchema.index({ titleId: 1, genreId: 1 }, { unique: true })

export type GenreTitleDocument = InferSchemaType<typeof GenreTitleSchema>
export const GenreTitleModel = model('GenreTitle', GenreTitleSchema)
