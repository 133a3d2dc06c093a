import bcrypt from 'bcrypt'
import type { Repositories } from '../infrastructure/repositories/index.js'
import type { Mailer } from '../infrastructure/EmailTool.js'
import type { User } from '../types/models.js'
import { NON_FIELD_ERRORS, NotFoundError, ValidationError } from '../types/common.js'
import { generateConfirmationCode } from '../common/random.js'
import { fromBase64Url, toBase64Url } from '../common/base64.js'
import { joinUrl } from '../common/url.js'
import { signAccessToken, signPasswordResetToken, verifyPasswordResetToken } from '../common/jwtAuth.js'
import { EMAIL_TAKEN, USERNAME_TAKEN } from './UserService.js'

export interface AuthOptions {
	/** Clear the confirmation code once it has been exchanged for a token. */
	singleUseCodes: boolean
	bcryptRounds: number
	/** Base for links sent by mail. */
	publicUrl: string
}

export interface SignUpInput {
	username: string
	email: string
}

export interface RegistrationInput extends SignUpInput {
	password: string
}

export const INVALID_CODE = 'Invalid confirmation code.'
export const INVALID_LOGIN = 'Please enter a correct username and password. Note that both fields may be case-sensitive.'
export const INVALID_RESET_LINK = 'The password reset link was invalid, possibly because it has already been used.'
export const WRONG_OLD_PASSWORD = 'Your old password was entered incorrectly. Please enter it again.'
export const UNKNOWN_EMAIL = 'No account is registered with this email address.'

/**
 * Account flows for both surfaces: the API's signup/token exchange driven by
 * mailed confirmation codes, and password accounts for the browsing pages.
 */
export class AuthService {
	constructor(
		private readonly repositories: Repositories,
		private readonly mailer: Mailer,
		private readonly options: AuthOptions,
	) {}

	/**
	 * Unknown username and email: create the account. Known username with the
	 * same email: issue a new code. Anything else is refused. Each accepted
	 * call sends exactly one mail.
	 */
	async signUp(input: SignUpInput): Promise<SignUpInput> {
		const { users } = this.repositories
		const code = generateConfirmationCode()
		const byUsername = await users.findByUsername(input.username)

		let user: User | null
		if (byUsername) {
			if (byUsername.email !== input.email) {
				throw ValidationError.forField('email', 'This email does not match the registered username.')
			}
			user = await users.update(byUsername.id, { confirmationCode: code })
			if (!user) throw new NotFoundError()
		} else {
			if (await users.findByEmail(input.email)) {
				throw ValidationError.forField('email', EMAIL_TAKEN)
			}
			user = await users.create({ username: input.username, email: input.email, confirmationCode: code })
			console.log(`✅ Registered user "${user.username}" pending confirmation`)
		}

		await this.sendConfirmationCode(user, code)
		return { email: user.email, username: user.username }
	}

	async issueToken(username: string, confirmationCode: string): Promise<{ token: string }> {
		const user = await this.repositories.users.findByUsername(username)
		if (!user) throw new NotFoundError()
		if (user.confirmationCode === null || user.confirmationCode !== confirmationCode) {
			throw ValidationError.forField('confirmation_code', INVALID_CODE)
		}
		if (this.options.singleUseCodes) {
			await this.repositories.users.update(user.id, { confirmationCode: null })
		}
		return { token: signAccessToken(user) }
	}

	async register(input: RegistrationInput): Promise<User> {
		const { users } = this.repositories
		if (await users.findByUsername(input.username)) throw ValidationError.forField('username', USERNAME_TAKEN)
		if (await users.findByEmail(input.email)) throw ValidationError.forField('email', EMAIL_TAKEN)
		const passwordHash = await bcrypt.hash(input.password, this.options.bcryptRounds)
		const user = await users.create({ username: input.username, email: input.email, passwordHash })
		console.log(`✅ Registered user "${user.username}"`)
		return user
	}

	async login(username: string, password: string): Promise<{ user: User; token: string }> {
		const user = await this.repositories.users.findByUsername(username)
		if (!user?.passwordHash || !(await bcrypt.compare(password, user.passwordHash))) {
			throw ValidationError.forField(NON_FIELD_ERRORS, INVALID_LOGIN)
		}
		return { user, token: signAccessToken(user) }
	}

	async requestPasswordReset(email: string): Promise<void> {
		const user = await this.repositories.users.findByEmail(email)
		if (!user) throw ValidationError.forField('email', UNKNOWN_EMAIL)
		const link = joinUrl(this.options.publicUrl, `/auth/reset/${toBase64Url(String(user.id))}/${signPasswordResetToken(user)}`)
		await this.mailer.send({
			to: user.email,
			subject: 'Password reset',
			text: `${user.username}, follow this link to choose a new password: ${link}`,
		})
	}

	/** The token stops verifying once the password has changed, so every link works at most once. */
	async resetPassword(uid: string, token: string, newPassword: string): Promise<void> {
		const id = Number(fromBase64Url(uid))
		const user = Number.isInteger(id) ? await this.repositories.users.findById(id) : null
		if (!user || !verifyPasswordResetToken(token, user)) {
			throw ValidationError.forField(NON_FIELD_ERRORS, INVALID_RESET_LINK)
		}
		await this.setPassword(user, newPassword)
	}

	async changePassword(user: User, oldPassword: string, newPassword: string): Promise<void> {
		if (!user.passwordHash || !(await bcrypt.compare(oldPassword, user.passwordHash))) {
			throw ValidationError.forField('old_password', WRONG_OLD_PASSWORD)
		}
		await this.setPassword(user, newPassword)
	}

	private async setPassword(user: User, password: string) {
		const passwordHash = await bcrypt.hash(password, this.options.bcryptRounds)
		await this.repositories.users.update(user.id, { passwordHash })
		console.log(`🔑 Password updated for "${user.username}"`)
	}

	private async sendConfirmationCode(user: User, code: string) {
		await this.mailer.send({
			to: user.email,
			subject: 'Confirmation code',
			text: `${user.username}, your confirmation code is ${code}`,
		})
	}
}
