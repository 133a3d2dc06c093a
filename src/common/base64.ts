export const toBase64Url = (input: string) => Buffer.from(input).toString('base64url')
export const fromBase64Url = (b64: string) => Buffer.from(b64, 'base64url').toString('utf8')
