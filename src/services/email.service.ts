// file: src/services/email.service.ts

import { EMAIL_CONFIG, EMAIL_ENABLED } from "@/config/email.config";
import { APP } from "@/constants/app.constants";
import { env } from "@/env";
import { logger } from "@/middlewares/pino-logger";
import { formatTimeTo12Hour } from "@/utils/time.utils";
import nodemailer, { type Transporter } from "nodemailer";

type BasicEmailPayload = {
  to: string;
  subject: string;
  html: string;
  text?: string;
};

type VerificationEmailPayload = {
  to: string;
  userName: string;
  verificationCode: string;
  expiresInMinutes: number;
};

type PasswordResetEmailPayload = {
  to: string;
  userName: string;
  resetCode: string;
  expiresInMinutes: number;
};

type WelcomeEmailPayload = {
  to: string;
  userName: string;
  userType: string;
  loginLink: string;
};

type CredentialsEmailPayload = {
  to: string;
  userName: string;
  userType: string;
  password: string;
};

type PasswordChangePayload = {
  to: string;
  userName: string;
  changedAt: Date;
};

type OrderEmailPayload = {
  to: string;
  userName: string;
  orderId: string;
  scheduledDate: string;
  scheduledTime: string;
};

type OrderReceivedPayload = OrderEmailPayload & {
  totalPrice: number;
  estimatedTimeMinutes: number;
};

type OrderStatusPayload = OrderEmailPayload & {
  status: string;
};

type CleanerAssignedPayload = OrderEmailPayload & {
  address?: string;
};

export class EmailService {
  private transporter?: Transporter;
  private readonly fromAddress: string;
  private readonly enabled: boolean;

  constructor(transporter?: Transporter) {
    this.fromAddress = EMAIL_CONFIG.from;

    if (transporter) {
      this.transporter = transporter;
      this.enabled = true;
      return;
    }

    this.enabled = EMAIL_ENABLED && env.NODE_ENV !== "test";
    if (this.enabled) {
      this.transporter = nodemailer.createTransport({
        host: EMAIL_CONFIG.host,
        port: EMAIL_CONFIG.port,
        secure: EMAIL_CONFIG.secure,
        auth: EMAIL_CONFIG.auth,
      });
    }
  }

  async sendEmailVerification(
    payload: VerificationEmailPayload
  ): Promise<boolean> {
    const html = this.wrapTemplate(`
      <p>Hi ${this.safeText(payload.userName)},</p>
      <p>Use the code below to verify your account:</p>
      <p><strong>${payload.verificationCode}</strong></p>
      <p>This code expires in ${payload.expiresInMinutes} minutes.</p>
    `);

    return this.send({
      to: payload.to,
      subject: `${APP.NAME} email verification`,
      html,
      text: this.stripHtml(html),
    });
  }

  async sendPasswordResetCode(
    payload: PasswordResetEmailPayload
  ): Promise<boolean> {
    const html = this.wrapTemplate(`
      <p>Hi ${this.safeText(payload.userName)},</p>
      <p>Use the code below to reset your password:</p>
      <p><strong>${payload.resetCode}</strong></p>
      <p>This code expires in ${payload.expiresInMinutes} minutes.</p>
      <p>If you did not ask for a reset, you can ignore this email.</p>
    `);

    return this.send({
      to: payload.to,
      subject: `${APP.NAME} password reset`,
      html,
      text: this.stripHtml(html),
    });
  }

  async sendWelcomeEmail(payload: WelcomeEmailPayload): Promise<boolean> {
    const html = this.wrapTemplate(`
      <p>Hi ${this.safeText(payload.userName)},</p>
      <p>Your ${this.safeText(payload.userType)} account is ready.</p>
      <p>You can log in here: <a href="${payload.loginLink}">${payload.loginLink}</a></p>
      <p>If you did not create this account, please contact support.</p>
    `);

    return this.send({
      to: payload.to,
      subject: `Welcome to ${APP.NAME}`,
      html,
      text: this.stripHtml(html),
    });
  }

  async sendAccountCredentials(
    payload: CredentialsEmailPayload
  ): Promise<boolean> {
    const html = this.wrapTemplate(`
      <p>Hi ${this.safeText(payload.userName)},</p>
      <p>A ${this.safeText(payload.userType)} account was created for you.</p>
      <p>Email: <strong>${this.safeText(payload.to)}</strong></p>
      <p>Temporary password: <strong>${this.safeText(payload.password)}</strong></p>
      <p>Please change it after your first login.</p>
    `);

    return this.send({
      to: payload.to,
      subject: `${APP.NAME} account credentials`,
      html,
      text: this.stripHtml(html),
    });
  }

  async sendPasswordChangeNotification(
    payload: PasswordChangePayload
  ): Promise<boolean> {
    const html = this.wrapTemplate(`
      <p>Hi ${this.safeText(payload.userName)},</p>
      <p>Your password was changed on ${payload.changedAt.toISOString()}.</p>
      <p>If you did not perform this action, please contact support immediately.</p>
    `);

    return this.send({
      to: payload.to,
      subject: `${APP.NAME} password changed`,
      html,
      text: this.stripHtml(html),
    });
  }

  async sendOrderReceived(payload: OrderReceivedPayload): Promise<boolean> {
    const html = this.wrapTemplate(`
      <p>Hi ${this.safeText(payload.userName)},</p>
      <p>We received your order <strong>#${payload.orderId}</strong>.</p>
      <p>Scheduled for ${this.describeSlot(payload)}.</p>
      <p>Total: ${payload.totalPrice.toFixed(2)}, estimated duration ${payload.estimatedTimeMinutes} minutes.</p>
      <p>We will let you know once it is confirmed.</p>
    `);

    return this.send({
      to: payload.to,
      subject: `${APP.NAME} order received`,
      html,
      text: this.stripHtml(html),
    });
  }

  async sendOrderStatusChanged(payload: OrderStatusPayload): Promise<boolean> {
    const status = payload.status.replace(/_/g, " ");
    const html = this.wrapTemplate(`
      <p>Hi ${this.safeText(payload.userName)},</p>
      <p>Your order <strong>#${payload.orderId}</strong> scheduled for ${this.describeSlot(payload)} is now <strong>${status}</strong>.</p>
    `);

    return this.send({
      to: payload.to,
      subject: `${APP.NAME} order ${status}`,
      html,
      text: this.stripHtml(html),
    });
  }

  async sendCleanerAssigned(payload: CleanerAssignedPayload): Promise<boolean> {
    const html = this.wrapTemplate(`
      <p>Hi ${this.safeText(payload.userName)},</p>
      <p>You have been assigned to order <strong>#${payload.orderId}</strong> on ${this.describeSlot(payload)}.</p>
      ${payload.address ? `<p>Address: ${this.safeText(payload.address)}</p>` : ""}
    `);

    return this.send({
      to: payload.to,
      subject: `${APP.NAME} new assignment`,
      html,
      text: this.stripHtml(html),
    });
  }

  private async send(payload: BasicEmailPayload): Promise<boolean> {
    if (!this.enabled || !this.transporter) {
      logger.debug(
        { to: payload.to, subject: payload.subject },
        "Email delivery skipped (not configured)"
      );
      return false;
    }

    try {
      await this.transporter.sendMail({
        from: this.fromAddress,
        to: payload.to,
        subject: payload.subject,
        html: payload.html,
        text: payload.text,
      });
      return true;
    } catch (error) {
      logger.warn(
        { to: payload.to, subject: payload.subject, error },
        "Email delivery failed"
      );
      return false;
    }
  }

  private describeSlot(payload: OrderEmailPayload): string {
    return `${payload.scheduledDate} at ${formatTimeTo12Hour(payload.scheduledTime)}`;
  }

  private wrapTemplate(content: string): string {
    return `
      <div style="font-family: Arial, sans-serif; color: #111;">
        <h2>${APP.NAME}</h2>
        ${content}
        <p>Thanks,</p>
        <p>The ${APP.NAME} team</p>
      </div>
    `;
  }

  private safeText(value: string): string {
    return value.replace(/[&<>"']/g, (char) => {
      const escapeMap: Record<string, string> = {
        "&": "&amp;",
        "<": "&lt;",
        ">": "&gt;",
        '"': "&quot;",
        "'": "&#39;",
      };
      return escapeMap[char] || char;
    });
  }

  private stripHtml(html: string): string {
    return html.replace(/<[^>]+>/g, " ").replace(/\s+/g, " ").trim();
  }
}
