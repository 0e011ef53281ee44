import type { HttpSession } from "./core/session";
import type { Logger } from "./logger";
import type { DetectedForm, LoginTarget, SubmissionResult } from "./types";

/**
 * Assemble the fields a submission sends: the form's own defaults, then the
 * credentials under the resolved field names, then the extra fields.
 * Later entries win on a name collision.
 */
export function buildFieldSet(form: DetectedForm, target: LoginTarget): Record<string, string> {
  return {
    ...form.defaults,
    [form.usernameField]: target.username,
    [form.passwordField]: target.password,
    ...target.extraFields,
  };
}

/**
 * Submit a detected login form through the session and follow the redirect
 * chain to its end.
 * @param session - Session that fetched the login page (carries its cookies)
 * @param form - Form picked by the locator
 * @param target - Credentials and extra fields
 * @param pageUrl - URL the form was found on, sent as Referer
 */
export async function submitLoginForm(
  session: HttpSession,
  form: DetectedForm,
  target: LoginTarget,
  pageUrl: string,
  logger?: Logger
): Promise<SubmissionResult> {
  const fields = buildFieldSet(form, target);

  logger?.info("SUBMIT_FORM", {
    method: form.method,
    action: form.actionUrl,
    fields: Object.keys(fields),
  });

  const response =
    form.method === "GET"
      ? await session.request(withQuery(form.actionUrl, fields), {
          method: "GET",
          headers: { Referer: pageUrl },
        })
      : await session.request(form.actionUrl, {
          method: "POST",
          body: new URLSearchParams(fields).toString(),
          headers: {
            "Content-Type": "application/x-www-form-urlencoded",
            Origin: new URL(pageUrl).origin,
            Referer: pageUrl,
          },
        });

  return {
    finalUrl: response.finalUrl,
    statusCode: response.statusCode,
    responseHeaders: response.responseHeaders,
    redirectChain: response.redirectChain,
  };
}

function withQuery(actionUrl: string, fields: Record<string, string>): string {
  const url = new URL(actionUrl);
  for (const [name, value] of Object.entries(fields)) {
    url.searchParams.set(name, value);
  }
  return url.href;
}
