/**
 * Notification Module
 *
 * Mail delivery, run report notifiers and the run history.
 */

import * as Mailer from './mailer';
import * as Notifier from './notifier';
import * as History from './history';

export type MailerInstance = Mailer.MailerInstance;
export type RunHistory = History.HistoryInstance;
export type { MailSettings, MailTransport, MailMessage } from './mailer';
export type { HistoryEntry } from './history';

export const createMailer = Mailer.create;
export const createRunHistory = History.create;
export const createLogNotifier = Notifier.createLogNotifier;
export const createMailNotifier = Notifier.createMailNotifier;
export const combine = Notifier.combine;
export const subjectFor = Notifier.subjectFor;
