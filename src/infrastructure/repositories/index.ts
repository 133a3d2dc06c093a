import { MongoUserRepository } from './UserRepository.js'
import { MongoTaxonRepository } from './TaxonRepository.js'
import { MongoTitleRepository } from './TitleRepository.js'
import { MongoReviewRepository } from './ReviewRepository.js'
import { MongoCommentRepository } from './CommentRepository.js'
import type { Repositories } from './types.js'

export function createMongoRepositories(): Repositories {
	return {
		users: new MongoUserRepository(),
		categories: new MongoTaxonRepository('category'),
		genres: new MongoTaxonRepository('genre'),
		titles: new MongoTitleRepository(),
		reviews: new MongoReviewRepository(),
		comments: new MongoCommentRepository(),
	}
}

export * from './types.js'
