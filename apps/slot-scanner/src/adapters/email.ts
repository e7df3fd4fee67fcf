import nodemailer from "nodemailer";
import type { ScannerConfig, SmtpSettings } from "../config.js";

export type EmailMessage = {
  subject: string;
  text: string;
};

/** The slice of a nodemailer transporter the mailer needs. */
export interface MailTransport {
  sendMail(mail: {
    from: string;
    to: string[];
    subject: string;
    text: string;
  }): Promise<{ messageId?: string }>;
  close(): void;
}

export interface Mailer {
  send(msg: EmailMessage): Promise<string>;
  close(): void;
}

export function createSmtpTransport(smtp: SmtpSettings): MailTransport {
  const implicitTls = smtp.port === 465;
  return nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: implicitTls,
    requireTLS: !implicitTls, // STARTTLS on 587/25
    auth: { user: smtp.user, pass: smtp.pass },
  });
}

export function createMailer(
  config: Pick<ScannerConfig, "smtp" | "mail">,
  transport: MailTransport = createSmtpTransport(config.smtp),
): Mailer {
  return {
    async send(msg) {
      const info = await transport.sendMail({
        from: config.mail.from,
        to: [...config.mail.to],
        subject: msg.subject,
        text: msg.text,
      });
      return info.messageId || "smtp-no-id";
    },
    close() {
      transport.close();
    },
  };
}
