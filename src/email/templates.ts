/**
 * Email Templates — HTML and plain text for every notification the platform sends.
 *
 * HTML uses inline styles for email client compatibility. All user-supplied
 * values are escaped.
 */

import type { ReviewDecision } from "../domain/types.js";

export const BRAND = "Pressroom";
export const NEWSLETTER_PREVIEW_LENGTH = 200;

export function escapeHtml(str: string): string {
  const map: Record<string, string> = {
    "&": "&amp;",
    "<": "&lt;",
    ">": "&gt;",
    '"': "&quot;",
    "'": "&#39;",
  };
  return str.replace(/[&<>"']/g, (char) => map[char] || char);
}

// ---------------------------------------------------------------------------
// Shared layout helpers
// ---------------------------------------------------------------------------

function wrapHtml(title: string, bodyContent: string): string {
  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
</head>
<body style="margin: 0; padding: 0; font-family: Georgia, 'Times New Roman', serif; background-color: #f4f4f4;">
  <table role="presentation" style="width: 100%; border-collapse: collapse;">
    <tr>
      <td style="padding: 40px 0; text-align: center;">
        <table role="presentation" style="width: 600px; margin: 0 auto; background-color: #ffffff; border-radius: 8px;">
          ${bodyContent}
        </table>
      </td>
    </tr>
  </table>
</body>
</html>`;
}

function heading(text: string): string {
  return `<tr>
  <td style="padding: 40px 40px 20px 40px; text-align: center;">
    <h1 style="margin: 0; font-size: 24px; font-weight: 600; color: #1a1a1a;">${escapeHtml(text)}</h1>
  </td>
</tr>`;
}

function paragraph(html: string): string {
  return `<tr>
  <td style="padding: 0 40px 20px 40px; color: #4a5568; font-size: 16px; line-height: 24px;">
    ${html}
  </td>
</tr>`;
}

function button(url: string, label: string): string {
  return `<tr>
  <td style="padding: 0 40px 30px 40px; text-align: center;">
    <a href="${escapeHtml(url)}" style="display: inline-block; padding: 12px 32px; background-color: #1f2937; color: #ffffff; text-decoration: none; font-weight: 600; border-radius: 6px; font-size: 16px;">${escapeHtml(label)}</a>
  </td>
</tr>`;
}

function footer(text: string): string {
  return `<tr>
  <td style="padding: 0 40px 40px 40px; color: #718096; font-size: 14px; line-height: 20px; border-top: 1px solid #e2e8f0;">
    <p style="margin-top: 20px;">${escapeHtml(text)}</p>
  </td>
</tr>`;
}

const SIGN_OFF = `Best regards,\nThe ${BRAND} Team`;

// ---------------------------------------------------------------------------
// Template types
// ---------------------------------------------------------------------------

export type TemplateName =
  | "password-reset"
  | "role-approved"
  | "role-rejected"
  | "article-status"
  | "new-article"
  | "new-newsletter"
  | "newsletter-published";

export interface TemplateResult {
  subject: string;
  html: string;
  text: string;
}

/** What subscriber notifications say about a piece of content. */
export interface ContentSummary {
  title: string;
  authorName: string;
  publisherName: string;
}

// ---------------------------------------------------------------------------
// Password reset
// ---------------------------------------------------------------------------

export function passwordResetTemplate(username: string, resetUrl: string): TemplateResult {
  const html = wrapHtml(
    "Password Reset",
    [
      heading("Password Reset"),
      paragraph(`<p>Hi ${escapeHtml(username)},</p>
    <p>Here is a link to reset your password. It expires in 5 minutes and works once.</p>`),
      button(resetUrl, "Reset Password"),
      paragraph(`<p style="word-break: break-all; color: #1f2937; font-size: 14px;">${escapeHtml(resetUrl)}</p>`),
      footer("If you didn't request this password reset, you can safely ignore this email."),
    ].join("\n"),
  );

  const text = `Hi ${username},\nHere is a link to reset your password: ${resetUrl}`;

  return { subject: "Password Reset", html, text };
}

// ---------------------------------------------------------------------------
// Role application decisions
// ---------------------------------------------------------------------------

export function roleApprovedTemplate(username: string, role: string): TemplateResult {
  const html = wrapHtml(
    "Application approved",
    [
      heading("Your application was approved"),
      paragraph(`<p>Hi ${escapeHtml(username)},</p>
    <p>Congratulations! Your application for the role <strong>${escapeHtml(role)}</strong> has been approved.</p>
    <p>You can now log in and start using your new permissions.</p>`),
    ].join("\n"),
  );

  const text =
    `Hi ${username},\n\n` +
    `Congratulations! Your application for the role '${role}' has been approved.\n` +
    "You can now log in and start using your new permissions.";

  return { subject: "Your role application was approved", html, text };
}

export function roleRejectedTemplate(username: string, role: string): TemplateResult {
  const html = wrapHtml(
    "Application rejected",
    [
      heading("Your application was rejected"),
      paragraph(`<p>Hi ${escapeHtml(username)},</p>
    <p>We're sorry to inform you that your application for the role <strong>${escapeHtml(role)}</strong> has been rejected.</p>
    <p>Feel free to apply again in the future.</p>`),
    ].join("\n"),
  );

  const text =
    `Hi ${username},\n\n` +
    `We're sorry to inform you that your application for the role '${role}' has been rejected.\n` +
    "Feel free to apply again in the future.";

  return { subject: "Your role application was rejected", html, text };
}

// ---------------------------------------------------------------------------
// Article review outcome (to the journalist)
// ---------------------------------------------------------------------------

export function articleStatusTemplate(username: string, title: string, status: ReviewDecision): TemplateResult {
  const statusDisplay = status.charAt(0).toUpperCase() + status.slice(1);
  const subject = `Your Article '${title}' has been ${statusDisplay}`;

  const html = wrapHtml(
    subject,
    [
      heading(`Article ${statusDisplay}`),
      paragraph(`<p>Hi ${escapeHtml(username)},</p>
    <p>Your article titled <strong>${escapeHtml(title)}</strong> has been ${status} by the editor.</p>`),
      footer(`Thank you for contributing to ${BRAND}!`),
    ].join("\n"),
  );

  const text =
    `Hi ${username},\n\n` +
    `Your article titled '${title}' has been ${status} by the editor.\n\n` +
    `Thank you for contributing to ${BRAND}!`;

  return { subject, html, text };
}

// ---------------------------------------------------------------------------
// Subscriber notifications
// ---------------------------------------------------------------------------

export function newArticleTemplate(username: string, article: ContentSummary): TemplateResult {
  const html = wrapHtml(
    `New Article: ${article.title}`,
    [
      heading("New article"),
      paragraph(`<p>Hi ${escapeHtml(username)},</p>
    <p>A new article has been published by ${escapeHtml(article.authorName)}!</p>
    <p><strong>Title:</strong> ${escapeHtml(article.title)}<br>
    <strong>Publisher:</strong> ${escapeHtml(article.publisherName)}</p>`),
      footer(`Read the full article at ${BRAND}.`),
    ].join("\n"),
  );

  const text =
    `Hi ${username},\n\n` +
    `A new article has been published by ${article.authorName}!\n\n` +
    `Title: ${article.title}\n` +
    `Publisher: ${article.publisherName}\n\n` +
    `Read the full article at ${BRAND}.\n\n` +
    SIGN_OFF;

  return { subject: `New Article: ${article.title}`, html, text };
}

/** First 200 characters of the content, with "..." when it was cut. */
export function contentPreview(content: string): string {
  return content.length > NEWSLETTER_PREVIEW_LENGTH
    ? `${content.slice(0, NEWSLETTER_PREVIEW_LENGTH)}...`
    : content;
}

export function newNewsletterTemplate(
  username: string,
  newsletter: ContentSummary & { content: string },
): TemplateResult {
  const preview = contentPreview(newsletter.content);

  const html = wrapHtml(
    `New Newsletter: ${newsletter.title}`,
    [
      heading("New newsletter"),
      paragraph(`<p>Hi ${escapeHtml(username)},</p>
    <p>A new newsletter has been published by ${escapeHtml(newsletter.authorName)}!</p>
    <p><strong>Title:</strong> ${escapeHtml(newsletter.title)}<br>
    <strong>Publisher:</strong> ${escapeHtml(newsletter.publisherName)}</p>
    <blockquote style="margin: 0; padding-left: 12px; border-left: 3px solid #e2e8f0;">${escapeHtml(preview)}</blockquote>`),
      footer(`Read the full newsletter at ${BRAND}.`),
    ].join("\n"),
  );

  const text =
    `Hi ${username},\n\n` +
    `A new newsletter has been published by ${newsletter.authorName}!\n\n` +
    `Title: ${newsletter.title}\n` +
    `Publisher: ${newsletter.publisherName}\n\n` +
    `Content Preview:\n${preview}\n\n` +
    `Read the full newsletter at ${BRAND}.\n\n` +
    SIGN_OFF;

  return { subject: `New Newsletter: ${newsletter.title}`, html, text };
}

export function newsletterPublishedTemplate(username: string, title: string): TemplateResult {
  const html = wrapHtml(
    `Newsletter Published: ${title}`,
    [
      heading("Newsletter published"),
      paragraph(`<p>Hi ${escapeHtml(username)},</p>
    <p>Your newsletter <strong>${escapeHtml(title)}</strong> has been successfully published!</p>
    <p>Your newsletter is now live and visible to all subscribers.</p>`),
      footer(`Thank you for contributing to ${BRAND}!`),
    ].join("\n"),
  );

  const text =
    `Hi ${username},\n\n` +
    `Your newsletter '${title}' has been successfully published!\n\n` +
    "Your newsletter is now live and visible to all subscribers.\n\n" +
    `Thank you for contributing to ${BRAND}!\n\n` +
    SIGN_OFF;

  return { subject: `Newsletter Published: ${title}`, html, text };
}
