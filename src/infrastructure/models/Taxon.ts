import { Schema, model, type InferSchemaType } from 'mongoose'

// Categories and genres are stored alike, each in its own collection
function createTaxonSchema(collection: string) {
	const schema = new Schema({
		taxonId: { type: Number, required: true, unique: true, index: true },
		name: { type: String, required: true, maxlength: 256 },
		slug: { type: String, required: true, unique: true, index: true, maxlength: 50 }
	}, { timestamps: true, versionKey: false, collection })

	schema.index({ name: 1 })
	return schema
}

const CategorySchema = createTaxonSchema('categories')
const GenreSchema = createTaxonSchema('genres')

export type TaxonDocument = InferSchemaType<typeof CategorySchema>
export const CategoryModel = model('Category', CategorySchema)
export const GenreModel = model('Genre', GenreSchema)
