import { Schema, model, type InferSchemaType } from 'mongoose'

const ReviewSchema = new Schema({
	reviewId: { type: Number, required: true, unique: true, index: true },
	titleId: { type: Number, required: true, index: true },
	authorId: { type: Number, required: true, index: true },
	text: { type: String, required: true },
	score: { type: Number, required: true, min: 0, max: 10 },
	pubDate: { type: Date, required: true, default: Date.now }
}, { timestamps: true, versionKey: false, collection: 'reviews' })

// One review per author per title; the store is the final authority
ReviewSchema.index({ authorId: 1, titleId: 1 }, { unique: true, name: 'unique_review_author' })
// Newest first within a title
ReviewSchema.index({ titleId: 1, pubDate: -1 })
ReviewSchema.index({ authorId: 1, pubDate: -1 })

export type ReviewDocument = InferSchemaType<typeof ReviewSchema>
export const ReviewModel = model('Review', ReviewSchema)
