import { Schema, model, type InferSchemaType } from 'mongoose'

const CommentSchema = new Schema({
	commentId: { type: Number, required: true, unique: true, index: true },
	reviewId: { type: Number, required: true, index: true },
	authorId: { type: Number, required: true, index: true },
	text: { type: String, required: true },
	pubDate: { type: Date, required: true, default: Date.now }
}, { timestamps: true, versionKey: false, collection: 'comments' })

// Recent comments for a review
CommentSchema.index({ reviewId: 1, pubDate: -1 })

export type CommentDocument = InferSchemaType<typeof CommentSchema>
export const CommentModel = model('Comment', CommentSchema)
