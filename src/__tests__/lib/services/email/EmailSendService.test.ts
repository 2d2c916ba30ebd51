import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import nodemailer from 'nodemailer';
import { EmailSendService } from '@/lib/services/email/EmailSendService';

// Mock de nodemailer
jest.mock('nodemailer');

const mockTransporter = {
  sendMail: jest.fn(),
};

const mockCreateTransport = jest.mocked(nodemailer.createTransport);

const relayConfig = {
  user: 'sender@example.com',
  password: 'test-secret',
  host: 'smtp.example.com',
  port: 465,
  secure: true,
};

describe('EmailSendService', () => {
  let tmpDir: string;
  let pdfPath: string;

  beforeEach(async () => {
    jest.clearAllMocks();
    mockCreateTransport.mockReturnValue(mockTransporter as unknown as nodemailer.Transporter);

    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'article-mail-test-'));
    pdfPath = path.join(tmpDir, 'article-1234.pdf');
    await fs.writeFile(pdfPath, '%PDF-1.3 contenido de prueba');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should authenticate against the configured relay over TLS', async () => {
    mockTransporter.sendMail.mockResolvedValue({ messageId: 'msg-1' });
    const service = new EmailSendService(relayConfig);

    await service.send({
      to: 'reader@example.com',
      subject: 'Article from https://example.com/post',
      text: 'Please find the attached article.',
      pdfPath,
    });

    expect(mockCreateTransport).toHaveBeenCalledWith({
      host: 'smtp.example.com',
      port: 465,
      secure: true,
      auth: { user: 'sender@example.com', pass: 'test-secret' },
    });
  });

  it('should attach the PDF as article.pdf with a plain-text body', async () => {
    mockTransporter.sendMail.mockResolvedValue({ messageId: 'msg-1' });
    const service = new EmailSendService(relayConfig);

    const result = await service.send({
      to: 'reader@example.com',
      subject: 'Article from https://example.com/post',
      text: 'Please find the attached article.',
      pdfPath,
    });

    expect(mockTransporter.sendMail).toHaveBeenCalledWith({
      from: 'sender@example.com',
      to: 'reader@example.com',
      subject: 'Article from https://example.com/post',
      text: 'Please find the attached article.',
      attachments: [
        {
          filename: 'article.pdf',
          content: Buffer.from('%PDF-1.3 contenido de prueba'),
          contentType: 'application/pdf',
        },
      ],
    });
    expect(result.messageId).toBe('msg-1');
    expect(result.recipient).toBe('reader@example.com');
    expect(result.subject).toBe('Article from https://example.com/post');
  });

  it('should propagate SMTP errors without retrying', async () => {
    mockTransporter.sendMail.mockRejectedValue(new Error('Invalid login: 535 Authentication failed'));
    const service = new EmailSendService(relayConfig);

    await expect(
      service.send({ to: 'reader@example.com', subject: 's', text: 't', pdfPath })
    ).rejects.toThrow('Invalid login: 535 Authentication failed');
    expect(mockTransporter.sendMail).toHaveBeenCalledTimes(1);
  });

  it('should fail before connecting when the PDF is missing', async () => {
    const service = new EmailSendService(relayConfig);

    await expect(
      service.send({ to: 'reader@example.com', subject: 's', text: 't', pdfPath: path.join(tmpDir, 'nope.pdf') })
    ).rejects.toThrow('ENOENT');
    expect(mockCreateTransport).not.toHaveBeenCalled();
  });
});
