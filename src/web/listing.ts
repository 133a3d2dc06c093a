import type { FastifyRequest } from 'fastify'
import { paginate, parsePageRequest, type Listing, type Page } from '../common/pagination.js'
import { NotFoundError } from '../types/common.js'
import { queryValue } from '../api/request.js'

export interface PageInfo {
	number: number
	numPages: number
	count: number
	hasNext: boolean
	hasPrevious: boolean
	isPaginated: boolean
}

/**
 * A page showing one parent record and a paginated relation of it, such
 * as a title with its reviews. The parent is looked up from the route
 * params; a missing parent is a 404.
 */
export interface RelatedListConfig<P, T> {
	resolveParent(request: FastifyRequest): Promise<P | null>
	listRelated(request: FastifyRequest, parent: P): Listing<T> | Promise<Listing<T>>
	pageSize: number
	/** Context key for the parent; omitted for parentless pages like the home page. */
	parentKey?: string
	itemsKey: string
	representParent?(parent: P): unknown
	representItem(item: T): unknown
	/** Additional context such as the create form's action URL. */
	extra?(parent: P): Record<string, unknown>
}

function pageInfo(page: Page<unknown>): PageInfo {
	return {
		number: page.number,
		numPages: page.numPages,
		count: page.count,
		hasNext: page.hasNext,
		hasPrevious: page.hasPrevious,
		isPaginated: page.numPages > 1,
	}
}

/** An empty relation is rendered as an empty list with no pagination info, whatever page was asked for. */
export function relatedListPage<P, T>(config: RelatedListConfig<P, T>) {
	return async (request: FastifyRequest) => {
		const parent = await config.resolveParent(request)
		if (parent === null) throw new NotFoundError()

		const listing = await config.listRelated(request, parent)
		const context: Record<string, unknown> = {}
		if (config.parentKey) {
			context[config.parentKey] = config.representParent ? config.representParent(parent) : parent
		}
		Object.assign(context, config.extra?.(parent))

		if ((await listing.count()) === 0) {
			context[config.itemsKey] = []
			context.page = null
			return context
		}

		const page = await paginate(listing, parsePageRequest(queryValue(request, 'page')), config.pageSize)
		context[config.itemsKey] = page.items.map(item => config.representItem(item))
		context.page = pageInfo(page)
		return context
	}
}
