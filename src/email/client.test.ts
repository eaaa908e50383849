import { beforeEach, describe, expect, it, vi } from "vitest";
import { logger } from "../config/logger.js";
import { createEmailSender, EmailClient, LogEmailSender } from "./client.js";

const mockSend = vi.fn();

vi.mock("resend", () => ({
  Resend: class MockResend {
    emails = { send: mockSend };
  },
}));

vi.mock("../config/logger.js", () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

describe("EmailClient", () => {
  let client: EmailClient;

  beforeEach(() => {
    vi.clearAllMocks();
    mockSend.mockResolvedValue({ data: { id: "email-123" }, error: null });
    client = new EmailClient({
      apiKey: "test-api-key",
      from: "noreply@pressroom.local",
      replyTo: "desk@pressroom.local",
    });
  });

  it("should send email with correct parameters", async () => {
    const result = await client.send({
      to: "user@test.com",
      subject: "Test Subject",
      html: "<p>Test</p>",
      text: "Test",
    });

    expect(result).toEqual({ id: "email-123", success: true });
    expect(mockSend).toHaveBeenCalledWith({
      from: "noreply@pressroom.local",
      replyTo: "desk@pressroom.local",
      to: "user@test.com",
      subject: "Test Subject",
      html: "<p>Test</p>",
      text: "Test",
    });
  });

  it("should throw on Resend API error", async () => {
    mockSend.mockResolvedValueOnce({ data: null, error: { message: "Rate limit" } });

    await expect(client.send({ to: "user@test.com", subject: "Test", html: "<p>T</p>", text: "T" })).rejects.toThrow(
      "Failed to send email: Rate limit",
    );
    expect(logger.error).toHaveBeenCalledWith("Failed to send email", {
      to: "user@test.com",
      template: undefined,
      error: "Rate limit",
    });
  });

  it("should handle empty id from Resend", async () => {
    mockSend.mockResolvedValueOnce({ data: { id: undefined }, error: null });

    const result = await client.send({
      to: "user@test.com",
      subject: "Test",
      html: "<p>T</p>",
      text: "T",
    });

    expect(result).toEqual({ id: "", success: true });
  });
});

describe("LogEmailSender", () => {
  it("logs instead of sending", async () => {
    vi.clearAllMocks();
    const result = await new LogEmailSender().send({
      to: "user@test.com",
      subject: "Hello",
      html: "<p>Hi</p>",
      text: "Hi",
    });

    expect(result.success).toBe(true);
    expect(result.id.startsWith("log-")).toBe(true);
    expect(mockSend).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenCalledWith(
      "Email logged (no RESEND_API_KEY configured)",
      expect.objectContaining({ to: "user@test.com", subject: "Hello" }),
    );
  });
});

describe("createEmailSender", () => {
  it("returns the Resend client when an API key is configured", () => {
    expect(createEmailSender({ resendApiKey: "test-api-key", from: "a@b.c" })).toBeInstanceOf(EmailClient);
  });

  it("falls back to logging without an API key", () => {
    expect(createEmailSender({ from: "a@b.c" })).toBeInstanceOf(LogEmailSender);
  });
});
