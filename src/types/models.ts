// Domain records as they leave the repositories

export const ROLES = ['user', 'moderator', 'admin'] as const
export type Role = typeof ROLES[number]

export interface User {
	id: number
	username: string
	email: string
	firstName: string
	lastName: string
	bio: string | null
	role: Role
	isStaff: boolean
	confirmationCode: string | null
	passwordHash: string | null
	dateJoined: Date
}

export interface NewUser {
	username: string
	email: string
	firstName?: string
	lastName?: string
	bio?: string | null
	role?: Role
	isStaff?: boolean
	confirmationCode?: string | null
	passwordHash?: string | null
}

export type UserPatch = Partial<Omit<NewUser, 'isStaff'>>

/** Category and Genre share one shape: a display name plus a unique slug. */
export interface Taxon {
	id: number
	name: string
	slug: string
}

export type TaxonKind = 'category' | 'genre'

export type Category = Taxon
export type Genre = Taxon

export interface TitleData {
	name: string
	year: number
	categoryId: number
	genreIds: number[]
	description: string | null
}

/** A title joined with its category, genres and the mean review score. */
export interface TitleView {
	id: number
	name: string
	year: number
	description: string | null
	rating: number | null
	category: Category
	genres: Genre[]
}

export interface TitleFilter {
	categoryId?: number
	genreId?: number
	name?: string
	year?: number
}

export interface Review {
	id: number
	titleId: number
	authorId: number
	author: string
	text: string
	score: number
	pubDate: Date
}

export interface NewReview {
	titleId: number
	authorId: number
	text: string
	score: number
}

export interface Comment {
	id: number
	reviewId: number
	authorId: number
	author: string
	text: string
	pubDate: Date
}

export interface NewComment {
	reviewId: number
	authorId: number
	text: string
}

/** Anything with an author can be checked for ownership. */
export interface Authored {
	authorId: number
}
