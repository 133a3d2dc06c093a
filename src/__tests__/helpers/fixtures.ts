import type { FastifyInstance } from 'fastify'
import { buildApp } from '../../app.js'
import { signAccessToken } from '../../common/jwtAuth.js'
import { createServices, type ServiceOptions, type Services } from '../../services/index.js'
import type { Repositories } from '../../infrastructure/repositories/index.js'
import type { Role, Taxon, TitleView, User } from '../../types/models.js'
import { createMemoryRepositories, MemoryStore, RecordingMailer } from './memory.js'

export const TEST_OPTIONS: ServiceOptions = {
	singleUseCodes: false,
	bcryptRounds: 4,
	publicUrl: 'http://reviews.test',
	categoryDeletePolicy: 'cascade',
}

export interface World {
	store: MemoryStore
	repositories: Repositories
	mailer: RecordingMailer
	options: ServiceOptions
	services: Services
}

export function createWorld(overrides: Partial<ServiceOptions> = {}): World {
	const store = new MemoryStore()
	const repositories = createMemoryRepositories(store)
	const mailer = new RecordingMailer()
	const options = { ...TEST_OPTIONS, ...overrides }
	const services = createServices(repositories, mailer, options)
	return { store, repositories, mailer, options, services }
}

export function addUser(world: World, username: string, role: Role = 'user', extra: { isStaff?: boolean } = {}): Promise<User> {
	return world.repositories.users.create({
		username,
		email: `${username}@example.com`,
		role,
		isStaff: extra.isStaff ?? false,
	})
}

export interface Catalogue {
	admin: User
	moderator: User
	alice: User
	bob: User
	books: Taxon
	films: Taxon
	drama: Taxon
	comedy: Taxon
	/** 1869, books, drama */
	novel: TitleView
	/** 1994, films, comedy + drama */
	film: TitleView
	/** 2001, films, no genres */
	sequel: TitleView
}

export async function seedCatalogue(world: World): Promise<Catalogue> {
	const { repositories } = world
	const admin = await addUser(world, 'admin', 'admin')
	const moderator = await addUser(world, 'moderator', 'moderator')
	const alice = await addUser(world, 'alice')
	const bob = await addUser(world, 'bob')

	const books = await repositories.categories.create({ name: 'Books', slug: 'books' })
	const films = await repositories.categories.create({ name: 'Films', slug: 'films' })
	const drama = await repositories.genres.create({ name: 'Drama', slug: 'drama' })
	const comedy = await repositories.genres.create({ name: 'Comedy', slug: 'comedy' })

	const novel = await repositories.titles.create({
		name: 'War and Peace',
		year: 1869,
		categoryId: books.id,
		genreIds: [drama.id],
		description: 'A long novel',
	})
	const film = await repositories.titles.create({
		name: 'Pulp Fiction',
		year: 1994,
		categoryId: films.id,
		genreIds: [comedy.id, drama.id],
		description: null,
	})
	const sequel = await repositories.titles.create({
		name: 'Shrek',
		year: 2001,
		categoryId: films.id,
		genreIds: [],
		description: null,
	})

	return { admin, moderator, alice, bob, books, films, drama, comedy, novel, film, sequel }
}

export async function buildTestApp(world: World): Promise<FastifyInstance> {
	const app = await buildApp({
		repositories: world.repositories,
		mailer: world.mailer,
		serviceOptions: world.options,
		logger: false,
	})
	await app.ready()
	return app
}

export function bearer(user: User) {
	return { authorization: `Bearer ${signAccessToken(user)}` }
}

export function sessionCookie(user: User) {
	return { token: signAccessToken(user) }
}
