import type { SendMailOptions } from "nodemailer";
import { describe, expect, it, vi } from "vitest";
import { ConfigError, TransportError } from "@/lib/errors";
import type { DigestConfig } from "@/lib/types";
import { buildMessage, DigestMailer, parseAddressList, resolveRecipients, type MailTransportFactory } from "../mailer";

const mailConfig: DigestConfig["mail"] = {
  host: "smtp.example.com",
  port: 465,
  sender: "digest@example.com",
  password: "test-secret",
  recipients: null,
  recipient: null,
  mode: "to"
};

const digest = { subject: "Subject", body: "Body" };

function fakeTransport(sendMail: (options: SendMailOptions) => Promise<unknown> = async () => ({ messageId: "1" })) {
  const send = vi.fn(sendMail);
  const factory = vi.fn<MailTransportFactory>(() => ({ sendMail: send }));
  return { send, factory };
}

describe("parseAddressList", () => {
  it("extracts bracketed addresses and drops case-insensitive duplicates", () => {
    expect(parseAddressList("Dr. A <a@x.com>; A@X.com, B <b@x.com>")).toEqual(["a@x.com", "b@x.com"]);
  });

  it("splits on newlines and ignores tokens without an @", () => {
    expect(parseAddressList("c@x.com\n  \nnot-an-address")).toEqual(["c@x.com"]);
    expect(parseAddressList(null)).toEqual([]);
  });
});

describe("resolveRecipients", () => {
  it("prefers the list, then the single recipient, then the sender", () => {
    expect(resolveRecipients({ ...mailConfig, recipients: "a@x.com, b@x.com", recipient: "c@x.com" })).toEqual([
      "a@x.com",
      "b@x.com"
    ]);
    expect(resolveRecipients({ ...mailConfig, recipients: "nobody", recipient: "c@x.com" })).toEqual(["c@x.com"]);
    expect(resolveRecipients(mailConfig)).toEqual(["digest@example.com"]);
  });
});

function rawText(message: SendMailOptions): string {
  return Buffer.isBuffer(message.raw) ? message.raw.toString("utf8") : "";
}

describe("buildMessage", () => {
  const delivery = { sender: "digest@example.com", password: "test-secret", recipients: ["a@x.com", "b@x.com"] };

  it("wraps a base64 plain-text part in a multipart/mixed message", async () => {
    const message = await buildMessage(delivery, "to", digest);
    const raw = rawText(message);

    expect(message.envelope).toEqual({ from: "digest@example.com", to: ["a@x.com", "b@x.com"] });
    expect(raw).toMatch(/^Content-Type: multipart\/mixed;/m);
    expect(raw).toMatch(/^Content-Type: text\/plain; charset=utf-8\r$/m);
    expect(raw).toMatch(/^Content-Transfer-Encoding: base64\r$/m);
    expect(raw).toMatch(/^Qm9keQ==\r$/m);
    expect(raw).toMatch(/^From: digest@example\.com\r$/m);
    expect(raw).toMatch(/^To: a@x\.com, b@x\.com\r$/m);
    expect(raw).toMatch(/^Subject: Subject\r$/m);
  });

  it("addresses the sender and hides recipients in bcc mode", async () => {
    const message = await buildMessage(delivery, "bcc", digest);
    const raw = rawText(message);

    expect(raw).toMatch(/^To: digest@example\.com\r$/m);
    expect(raw).not.toMatch(/^Bcc:/m);
    expect(message.envelope).toEqual({ from: "digest@example.com", to: ["a@x.com", "b@x.com"] });
  });
});

describe("DigestMailer", () => {
  it("names every missing credential", () => {
    const mailer = new DigestMailer({ ...mailConfig, sender: null, password: null });
    expect(() => mailer.prepare()).toThrow(new ConfigError("Mail credentials are missing: MAIL_SENDER, MAIL_PASSWORD"));
  });

  it("rejects a configuration with no usable address", () => {
    const mailer = new DigestMailer({ ...mailConfig, sender: "digest" });
    expect(() => mailer.prepare()).toThrow(ConfigError);
  });

  it("sends one message through the transport", async () => {
    const { send, factory } = fakeTransport();
    const mailer = new DigestMailer({ ...mailConfig, recipients: "a@x.com" }, factory);

    const delivery = await mailer.send(digest);

    expect(delivery.recipients).toEqual(["a@x.com"]);
    expect(factory).toHaveBeenCalledWith(expect.objectContaining({ host: "smtp.example.com" }), delivery);
    expect(send).toHaveBeenCalledTimes(1);
    const message = send.mock.calls[0][0];
    expect(message.envelope).toEqual({ from: "digest@example.com", to: ["a@x.com"] });
    expect(rawText(message)).toMatch(/^To: a@x\.com\r$/m);
  });

  it("wraps SMTP failures with the server address", async () => {
    const { factory } = fakeTransport(async () => {
      throw new Error("535 authentication failed");
    });
    const mailer = new DigestMailer(mailConfig, factory);

    await expect(mailer.send(digest)).rejects.toThrow(
      new TransportError("smtp://smtp.example.com:465", "535 authentication failed")
    );
  });
});
