import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import { emailConfig } from '../connections/config/app.config';
import { logger } from './logging';

export interface LinkEmail {
  to: string;
  name: string;
  link: string;
}

/**
 * Outbound user notifications. Callers dispatch through runBestEffort, so an
 * implementation may throw freely.
 */
export interface NotificationSender {
  sendVerificationEmail(message: LinkEmail): Promise<void>;
  sendPasswordResetEmail(message: LinkEmail): Promise<void>;
}

export interface RenderedEmail {
  subject: string;
  html: string;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export const escapeHtml = (value: string): string =>
  value.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);

const layout = (title: string, body: string): string => `
    <div style="font-family: Arial, sans-serif; max-width: 600px; margin: 0 auto; padding: 20px;">
      <h2 style="color: #333; border-bottom: 2px solid #667eea; padding-bottom: 10px;">${title}</h2>
      ${body}
      <p style="color: #999; font-size: 12px; margin-top: 30px;">
        If you did not request this email, you can safely ignore it.
      </p>
    </div>
  `;

export const renderVerificationEmail = ({ name, link }: LinkEmail): RenderedEmail => {
  const href = escapeHtml(link);
  return {
    subject: 'Confirm your email address',
    html: layout(
      'Confirm your email address',
      `<p>Hello <strong>${escapeHtml(name)}</strong>,</p>
      <p>Thanks for signing up. Confirm your email address to activate your account:</p>
      <p><a href="${href}" style="color: #667eea;">${href}</a></p>
      <p style="color: #999; font-size: 12px;">This link expires in 24 hours.</p>`
    ),
  };
};

export const renderPasswordResetEmail = ({ name, link }: LinkEmail): RenderedEmail => {
  const href = escapeHtml(link);
  return {
    subject: 'Reset your password',
    html: layout(
      'Reset your password',
      `<p>Hello <strong>${escapeHtml(name)}</strong>,</p>
      <p>We received a request to reset your password. Choose a new one here:</p>
      <p><a href="${href}" style="color: #667eea;">${href}</a></p>
      <p style="color: #999; font-size: 12px;">This link expires in 1 hour and can be used once.</p>`
    ),
  };
};

export const createMailTransport = (): Transporter =>
  nodemailer.createTransport({
    host: emailConfig.host,
    port: emailConfig.port,
    secure: emailConfig.secure,
    auth: {
      user: emailConfig.user,
      pass: emailConfig.pass,
    },
  });

export class MailNotificationSender implements NotificationSender {
  constructor(
    private readonly transporter: Transporter,
    private readonly configured: boolean = Boolean(emailConfig.user && emailConfig.pass)
  ) {}

  sendVerificationEmail(message: LinkEmail): Promise<void> {
    return this.send(message.to, renderVerificationEmail(message), 'verification');
  }

  sendPasswordResetEmail(message: LinkEmail): Promise<void> {
    return this.send(message.to, renderPasswordResetEmail(message), 'password_reset');
  }

  private async send(to: string, email: RenderedEmail, type: string): Promise<void> {
    if (!this.configured) {
      throw new Error('SMTP is not configured');
    }

    await this.transporter.sendMail({
      from: `"${emailConfig.fromName}" <${emailConfig.from}>`,
      to,
      subject: email.subject,
      html: email.html,
    });
    logger.info('Email sent', { to, type });
  }
}
