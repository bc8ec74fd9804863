import * as cheerio from "cheerio";

export const TIME_RANGE_PATTERN = /(\d{2}:\d{2})\s*-\s*(\d{2}:\d{2})/;

export const LOGIN_PAGE_TITLE = "Login";

export interface LoginForm {
  verificationToken: string;
  passwordSalt: string;
}

export function pageTitle(html: string): string {
  return cheerio.load(html)("title").first().text().trim();
}

/**
 * Read the CSRF token and password salt from a login page. The token is
 * required; the salt may be empty.
 */
export function parseLoginForm(html: string): LoginForm | null {
  const $ = cheerio.load(html);
  const verificationToken = $("input[name=__RequestVerificationToken]").first().attr("value")?.trim() ?? "";
  if (!verificationToken) {
    return null;
  }

  return {
    verificationToken,
    passwordSalt: $("input#PasswordSalt").first().attr("value")?.trim() ?? "",
  };
}

// The portal answers with its login page when the session cookie is gone
export function isLoginPage(html: string): boolean {
  if (html.includes(`<title>${LOGIN_PAGE_TITLE}</title>`)) {
    return true;
  }
  const $ = cheerio.load(html);
  return $("title").first().text().trim() === LOGIN_PAGE_TITLE || $("input#PasswordSalt").length > 0;
}

export function parseTimeRange(text: string): { start: string; end: string } | null {
  const match = TIME_RANGE_PATTERN.exec(text);
  if (!match) return null;
  return { start: match[1], end: match[2] };
}
