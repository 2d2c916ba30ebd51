import fs from 'fs/promises';
import nodemailer from 'nodemailer';
import { EmailRelayConfig } from '@/lib/config/article-delivery-config';
import { logInfo } from '@/lib/utils/api-response-utils';

export const ARTICLE_ATTACHMENT_NAME = 'article.pdf';

export interface ArticleEmail {
  to: string;
  subject: string;
  text: string;
  pdfPath: string;
}

export interface SendArticleEmailResult {
  messageId: string;
  recipient: string;
  subject: string;
  sentAt: string;
}

export interface ArticleMailer {
  send(email: ArticleEmail): Promise<SendArticleEmailResult>;
}

export class EmailSendService implements ArticleMailer {
  constructor(private readonly config: EmailRelayConfig) {}

  /**
   * Envía el artículo como adjunto a través del relay SMTP configurado.
   * Cualquier error (auth, conexión, rechazo) se propaga al llamador.
   */
  async send(email: ArticleEmail): Promise<SendArticleEmailResult> {
    const { to, subject, text, pdfPath } = email;

    // Leer el adjunto antes de abrir la conexión
    const pdf = await fs.readFile(pdfPath);

    const transporter = nodemailer.createTransport({
      host: this.config.host,
      port: this.config.port,
      secure: this.config.secure,
      auth: {
        user: this.config.user,
        pass: this.config.password,
      },
    });

    const mailOptions: nodemailer.SendMailOptions = {
      from: this.config.user,
      to,
      subject,
      text,
      attachments: [
        {
          filename: ARTICLE_ATTACHMENT_NAME,
          content: pdf,
          contentType: 'application/pdf',
        },
      ],
    };

    const info = await transporter.sendMail(mailOptions);

    logInfo('EmailSend', 'Email enviado exitosamente:', {
      messageId: info.messageId,
      to,
      subject,
      attachmentBytes: pdf.length,
    });

    return {
      messageId: info.messageId,
      recipient: to,
      subject,
      sentAt: new Date().toISOString(),
    };
  }
}
