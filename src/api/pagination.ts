import type { FastifyRequest } from 'fastify'
import { ENV } from '../config/environment.js'
import { paginate, parsePageRequest, type Listing } from '../common/pagination.js'
import { withQueryParam } from '../common/url.js'
import type { PaginatedResponse } from '../types/common.js'
import { absoluteUrl, queryValue } from './request.js'

/**
 * Page-number pagination for list endpoints. Links are absolute and keep
 * every other query parameter; the link back to page one drops `page`.
 */
export async function paginatedResponse<T, U>(
	request: FastifyRequest,
	listing: Listing<T>,
	represent: (item: T) => U,
	pageSize = ENV.API_PAGE_SIZE,
): Promise<PaginatedResponse<U>> {
	const page = await paginate(listing, parsePageRequest(queryValue(request, 'page')), pageSize)
	const url = absoluteUrl(request)
	return {
		count: page.count,
		next: page.hasNext ? withQueryParam(url, 'page', String(page.number + 1)) : null,
		previous: page.hasPrevious
			? withQueryParam(url, 'page', page.number - 1 === 1 ? null : String(page.number - 1))
			: null,
		results: page.items.map(represent),
	}
}
