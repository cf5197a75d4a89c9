import { z } from "zod";
import { config } from "../config/index.js";
import { defineTool, type LocalTool } from "./defineTool.js";

export interface SendEmailOptions {
  /** HTTP endpoint that delivers the email */
  apiUrl?: string;
  timeoutMs?: number;
}

/**
 * send_email: forwards the message to the email delivery API
 */
export function createSendEmailTool(options: SendEmailOptions = {}): LocalTool {
  const apiUrl = options.apiUrl ?? config.email.apiUrl;
  const timeoutMs = options.timeoutMs ?? config.email.timeoutMs;

  return defineTool({
    name: "send_email",
    description: "Send an email. Both to_email and from_email must be verified sender addresses. Optionally include cc as a list of addresses.",
    input: {
      to_email: z.string().email().describe("Recipient email address"),
      from_email: z.string().email().describe("Sender email address"),
      subject: z.string().describe("Email subject line"),
      content: z.string().describe("Email body (HTML supported)"),
      cc: z.array(z.string().email()).optional().describe("CC recipients (optional)"),
    },
    handler: async (args, signal) => {
      if (!apiUrl) {
        throw new Error("EMAIL_API_URL is not configured");
      }

      console.log(`[Tool: send_email] ${args.from_email} -> ${args.to_email}: "${args.subject}"`);

      const timeout = AbortSignal.timeout(timeoutMs);
      const response = await fetch(apiUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          to_email: args.to_email,
          from_email: args.from_email,
          subject: args.subject,
          content: args.content,
          ...(args.cc && args.cc.length > 0 ? { cc: args.cc } : {}),
        }),
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });

      if (!response.ok) {
        throw new Error(`email API returned HTTP ${response.status}`);
      }

      const ccNote = args.cc && args.cc.length > 0 ? `, cc: ${args.cc.join(", ")}` : "";
      return `Email sent from ${args.from_email} to ${args.to_email}${ccNote}, status ${response.status}`;
    },
  });
}
