import { randomInt } from 'node:crypto'

const CODE_CHARSET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789'

export const CONFIRMATION_CODE_LENGTH = 12

export function randomString(length = 16, charset = CODE_CHARSET) {
  let out = ''
  for (let i = 0; i < length; i++) out += charset.charAt(randomInt(0, charset.length))
  return out
}

export function generateConfirmationCode() {
  return randomString(CONFIRMATION_CODE_LENGTH)
}
