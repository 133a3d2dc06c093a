import type { Authored, User } from '../types/models.js'
import { AuthenticationError, AuthorizationError } from '../types/common.js'

/**
 * Authorization rules for both surfaces.
 *
 * Privilege is always derived here from the user's role and staff flag; call
 * sites ask a question (`canModerate`, `canModify`) instead of comparing
 * role strings themselves.
 */

export type Principal = User | null

export const SAFE_METHODS: ReadonlySet<string> = new Set(['GET', 'HEAD', 'OPTIONS'])

export function isSafeMethod(method: string) {
	return SAFE_METHODS.has(method.toUpperCase())
}

export function isAdmin(user: Principal): boolean {
	return user?.role === 'admin'
}

export function isModerator(user: Principal): boolean {
	return user?.role === 'moderator'
}

export function isAuthenticated(user: Principal): user is User {
	return user !== null
}

/** Admins and staff manage the catalogue and user accounts. */
export function canAdminister(user: Principal): user is User {
	return user !== null && (isAdmin(user) || user.isStaff)
}

/** Admins, moderators and staff may edit or remove anyone's reviews and comments. */
export function canModerate(user: Principal): user is User {
	return user !== null && (isAdmin(user) || isModerator(user) || user.isStaff)
}

export function canModify(user: Principal, resource: Authored): user is User {
	return user !== null && (user.id === resource.authorId || canModerate(user))
}

export interface PermissionContext {
	method: string
	user: Principal
}

export interface PermissionPolicy {
	readonly name: string
	hasPermission(ctx: PermissionContext): boolean
	/** Checked once the instance is loaded; a policy without it allows any instance. */
	hasObjectPermission?(ctx: PermissionContext, resource: Authored): boolean
}

export const AdminOnly: PermissionPolicy = {
	name: 'AdminOnly',
	hasPermission: ({ user }) => canAdminister(user),
}

export const AdminOrReadOnly: PermissionPolicy = {
	name: 'AdminOrReadOnly',
	hasPermission: ({ method, user }) => isSafeMethod(method) || isAdmin(user),
}

export const AuthorOrPrivilegedOrReadOnly: PermissionPolicy = {
	name: 'AuthorOrPrivilegedOrReadOnly',
	hasPermission: ({ method, user }) => isSafeMethod(method) || isAuthenticated(user),
	hasObjectPermission: ({ method, user }, resource) => isSafeMethod(method) || canModify(user, resource),
}

export const Authenticated: PermissionPolicy = {
	name: 'Authenticated',
	hasPermission: ({ user }) => isAuthenticated(user),
}

function deny(user: Principal): never {
	if (user === null) throw new AuthenticationError()
	throw new AuthorizationError()
}

/** Every policy must pass (logical AND). */
export function assertPermission(policies: readonly PermissionPolicy[], ctx: PermissionContext): void {
	for (const policy of policies) {
		if (!policy.hasPermission(ctx)) deny(ctx.user)
	}
}

export function assertObjectPermission(policies: readonly PermissionPolicy[], ctx: PermissionContext, resource: Authored): void {
	for (const policy of policies) {
		if (policy.hasObjectPermission && !policy.hasObjectPermission(ctx, resource)) deny(ctx.user)
	}
}

export function assertCanModify(user: Principal, resource: Authored): asserts user is User {
	if (!canModify(user, resource)) deny(user)
}
