import nodemailer from 'nodemailer';
import { ENV } from '../config/environment.js';

export interface MailMessage {
	to: string;
	subject: string;
	text: string;
}

export interface Mailer {
	send(message: MailMessage): Promise<void>;
}

function ensureSmtpConfiguration(): void {
	if (!ENV.SMTP_ENDPOINT) {
		throw new Error('SMTP endpoint is not configured (SMTP_ENDPOINT)');
	}
	if (!ENV.SMTP_PORT) {
		throw new Error('SMTP port is not configured (SMTP_PORT)');
	}
	if (!ENV.SMTP_PASSWORD) {
		throw new Error('SMTP password is not configured (SMTP_PASSWORD)');
	}
}

/**
 * SMTP mailer. Without `SMTP_USER_NAME` messages are written to the log
 * instead, which is how development setups read their confirmation codes.
 */
export function createSmtpMailer(): Mailer {
	if (!ENV.SMTP_USER_NAME) {
		return {
			async send(message) {
				console.log(`📧 [mail skipped] to=${message.to} subject="${message.subject}"\n${message.text}`);
			},
		};
	}

	ensureSmtpConfiguration();

	const transporter = nodemailer.createTransport({
		host: ENV.SMTP_ENDPOINT,
		port: ENV.SMTP_PORT,
		secure: ENV.SMTP_PORT === 465,
		auth: {
			user: ENV.SMTP_USER_NAME,
			pass: ENV.SMTP_PASSWORD,
		},
	});

	return {
		async send(message) {
			if (!message.to) throw new Error('Recipient email is required');
			if (!message.subject) throw new Error('Email subject is required');

			const result = await transporter.sendMail({
				from: ENV.MAIL_FROM,
				to: message.to,
				subject: message.subject,
				text: message.text,
			});
			console.log(`📧 Mail ${result.messageId} sent to ${message.to}`);
		},
	};
}
