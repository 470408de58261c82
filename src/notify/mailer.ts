/**
 * Mailer
 *
 * Sends plain-text mail over SMTP with nodemailer. The transport is created
 * lazily, so a configuration without mail never opens a connection.
 */

import nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import * as Logging from '../logging';
import { permanent } from '../stage/errors';

export interface MailSettings {
    host?: string;
    port: number;
    secure: boolean;
    user?: string;
    password?: string;
    from?: string;
    to: string[];
}

export interface MailTransport {
    sendMail(message: SendMailOptions): Promise<unknown>;
}

export interface MailMessage {
    subject: string;
    text: string;
}

export interface MailerInstance {
    send(message: MailMessage): Promise<void>;
}

export interface MailerConfig {
    settings: MailSettings;
    transport?: MailTransport;
}

export const create = (config: MailerConfig): MailerInstance => {
    const logger = Logging.getLogger();
    const { settings } = config;
    let transport: MailTransport | null = config.transport ?? null;

    const getTransport = (): MailTransport => {
        if (!transport) {
            if (!settings.host) {
                throw permanent('mail.host is not configured');
            }
            transport = nodemailer.createTransport({
                host: settings.host,
                port: settings.port,
                secure: settings.secure,
                ...(settings.user ? { auth: { user: settings.user, pass: settings.password } } : {}),
            });
        }
        return transport;
    };

    const send = async (message: MailMessage): Promise<void> => {
        if (settings.to.length === 0) {
            throw permanent('mail.to has no recipients');
        }
        const from = settings.from ?? settings.user;
        if (!from) {
            throw permanent('mail.from is not configured');
        }

        await getTransport().sendMail({
            from,
            to: settings.to.join(', '),
            subject: message.subject,
            text: message.text,
        });
        logger.info('Sent "%s" to %s', message.subject, settings.to.join(', '));
    };

    return {
        send,
    };
};
