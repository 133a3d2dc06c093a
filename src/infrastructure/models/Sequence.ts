import { Schema, model } from 'mongoose'

const SequenceSchema = new Schema({
	name: { type: String, required: true, unique: true, index: true },
	value: { type: Number, required: true, default: 0 }
}, { collection: 'sequences', versionKey: false })

const SequenceModel = model('Sequence', SequenceSchema)

export type SequenceName = 'userId' | 'categoryId' | 'genreId' | 'titleId' | 'reviewId' | 'commentId'

export async function getNextSequence(name: SequenceName): Promise<number> {
	const doc = await SequenceModel.findOneAndUpdate(
		{ name },
		{ $inc: { value: 1 } },
		{ new: true, upsert: true }
	).lean()
	if (!doc) throw new Error(`Sequence ${name} could not be advanced`)
	return doc.value
}
