import nodemailer, { type SendMailOptions } from "nodemailer";
import MimeNode from "nodemailer/lib/mime-node/index.js";
import { ConfigError, TransportError, errorMessage } from "@/lib/errors";
import type { DigestConfig, RecipientMode } from "@/lib/types";
import type { ComposedDigest } from "./compose-digest";

type MailConfig = DigestConfig["mail"];

export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<unknown>;
}

export type MailTransportFactory = (config: MailConfig, credentials: MailCredentials) => MailTransport;

export interface MailCredentials {
  sender: string;
  password: string;
}

export interface PreparedDelivery extends MailCredentials {
  recipients: string[];
}

/**
 * Splits on commas, semicolons and newlines; `Name <address>` keeps only the
 * address. Duplicates are dropped case-insensitively, first spelling wins.
 */
export function parseAddressList(raw: string | null): string[] {
  if (!raw) {
    return [];
  }
  const seen = new Set<string>();
  const addresses: string[] = [];
  for (const token of raw.split(/[,;\n]/)) {
    const bracketed = token.match(/<([^>]+)>/);
    const address = (bracketed ? bracketed[1] : token).trim();
    if (!address.includes("@")) {
      continue;
    }
    const key = address.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      addresses.push(address);
    }
  }
  return addresses;
}

/** Multi-recipient setting, then the single recipient, then the sender itself. */
export function resolveRecipients(mail: MailConfig): string[] {
  for (const source of [mail.recipients, mail.recipient, mail.sender]) {
    const addresses = parseAddressList(source);
    if (addresses.length > 0) {
      return addresses;
    }
  }
  return [];
}

/**
 * Renders the digest as a `multipart/mixed` message holding one base64
 * `text/plain` part. In bcc mode the To header carries only the sender; the
 * envelope always lists every recipient.
 */
export async function buildMessage(
  delivery: PreparedDelivery,
  mode: RecipientMode,
  digest: ComposedDigest
): Promise<SendMailOptions> {
  const root = new MimeNode("multipart/mixed");
  root.setHeader("From", delivery.sender);
  root.setHeader("To", mode === "bcc" ? delivery.sender : delivery.recipients.join(", "));
  root.setHeader("Subject", digest.subject);
  root
    .createChild("text/plain; charset=utf-8")
    .setHeader("Content-Transfer-Encoding", "base64")
    .setContent(digest.body);

  const raw = await new Promise<Buffer>((resolve, reject) => {
    root.build((error, message) => (error ? reject(error) : resolve(message)));
  });
  return {
    envelope: {
      from: delivery.sender,
      to: delivery.recipients
    },
    raw
  };
}

const createSmtpTransport: MailTransportFactory = (config, credentials) =>
  nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: config.port === 465,
    auth: {
      user: credentials.sender,
      pass: credentials.password
    },
    connectionTimeout: 30_000,
    socketTimeout: 60_000
  });

export class DigestMailer {
  constructor(
    private readonly config: MailConfig,
    private readonly createTransport: MailTransportFactory = createSmtpTransport
  ) {}

  /** Throws {@link ConfigError} when the digest could not be sent. */
  prepare(): PreparedDelivery {
    const { sender, password } = this.config;
    if (!sender || !password) {
      const missing = [sender ? null : "MAIL_SENDER", password ? null : "MAIL_PASSWORD"].filter(Boolean);
      throw new ConfigError(`Mail credentials are missing: ${missing.join(", ")}`);
    }
    const recipients = resolveRecipients(this.config);
    if (recipients.length === 0) {
      throw new ConfigError("No recipient address (set RECIPIENT_EMAILS, RECIPIENT_EMAIL or MAIL_SENDER)");
    }
    return { sender, password, recipients };
  }

  async send(digest: ComposedDigest): Promise<PreparedDelivery> {
    const delivery = this.prepare();
    const transport = this.createTransport(this.config, delivery);
    const message = await buildMessage(delivery, this.config.mode, digest);
    try {
      await transport.sendMail(message);
    } catch (error) {
      throw new TransportError(`smtp://${this.config.host}:${this.config.port}`, errorMessage(error), {
        cause: error
      });
    }
    return delivery;
  }
}
