import { ENV } from '../config/environment.js'
import type { Repositories } from '../infrastructure/repositories/index.js'
import type { Mailer } from '../infrastructure/EmailTool.js'
import { AuthService, type AuthOptions } from './AuthService.js'
import { UserService } from './UserService.js'
import { TaxonomyService, type CategoryDeletePolicy } from './TaxonomyService.js'
import { TitleService } from './TitleService.js'
import { ReviewService } from './ReviewService.js'
import { CommentService } from './CommentService.js'

export interface ServiceOptions extends AuthOptions {
	categoryDeletePolicy: CategoryDeletePolicy
}

export interface Services {
	auth: AuthService
	users: UserService
	categories: TaxonomyService
	genres: TaxonomyService
	titles: TitleService
	reviews: ReviewService
	comments: CommentService
}

export function defaultServiceOptions(): ServiceOptions {
	return {
		singleUseCodes: ENV.CONFIRMATION_CODE_SINGLE_USE,
		bcryptRounds: ENV.BCRYPT_ROUNDS,
		publicUrl: ENV.PUBLIC_URL,
		categoryDeletePolicy: ENV.CATEGORY_DELETE_POLICY,
	}
}

export function createServices(repositories: Repositories, mailer: Mailer, overrides: Partial<ServiceOptions> = {}): Services {
	const options = { ...defaultServiceOptions(), ...overrides }
	return {
		auth: new AuthService(repositories, mailer, options),
		users: new UserService(repositories),
		categories: new TaxonomyService(repositories, 'category', options.categoryDeletePolicy),
		genres: new TaxonomyService(repositories, 'genre'),
		titles: new TitleService(repositories),
		reviews: new ReviewService(repositories),
		comments: new CommentService(repositories),
	}
}
