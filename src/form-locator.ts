import * as cheerio from "cheerio";
import type { DetectedForm, FormDetection, HttpMethod } from "./types";

/** Name, id or autocomplete hints that mark an input as the username slot */
const USERNAME_PATTERN = /user|e-?mail|login|account|ident/i;

/** Input types a browser renders as a single-line text box */
const TEXT_TYPES = new Set(["text", "email", "tel", "search", "url"]);

/** Input types that never carry a value of their own in a submission */
const NON_VALUE_TYPES = new Set(["submit", "image", "button", "reset", "file"]);

export interface FieldHints {
  usernameField?: string;
  passwordField?: string;
}

interface ScannedInput {
  name: string;
  type: string;
  id: string;
  autocomplete: string;
}

interface ScannedForm {
  action: string;
  method: HttpMethod;
  inputs: ScannedInput[];
  fieldNames: Set<string>;
  defaults: Record<string, string>;
}

/**
 * Find the most probable login form in a page.
 *
 * Forms score 2 for a password input and 1 more for a username-looking
 * text/email input; the first form with the top score wins. Field-name
 * overrides take precedence over detection: the first form holding every
 * overridden name is used, and the overridden names are what gets submitted.
 * @param html - Page HTML
 * @param pageUrl - Final URL the page was served from, used to resolve the action
 * @param hints - Explicit username/password field names
 */
export function locateLoginForm(
  html: string,
  pageUrl: string,
  hints: FieldHints = {}
): FormDetection {
  const $ = cheerio.load(html);
  const baseUrl = resolveBaseUrl($, pageUrl);
  const forms = scanForms($, pageUrl, baseUrl);

  if (forms.length === 0) {
    return { status: "absent", reason: `No <form> element found on ${pageUrl}` };
  }

  const overrides = [hints.usernameField, hints.passwordField].filter(
    (name): name is string => Boolean(name)
  );

  let chosen: ScannedForm | undefined;
  if (overrides.length > 0) {
    chosen =
      forms.find((f) => overrides.every((name) => f.fieldNames.has(name))) ??
      pickBestForm(forms) ??
      forms[0];
  } else {
    chosen = pickBestForm(forms);
  }

  if (!chosen) {
    return {
      status: "absent",
      reason: `None of the ${forms.length} form(s) on ${pageUrl} has a password field`,
    };
  }

  if (!/^https?:$/.test(new URL(chosen.action).protocol)) {
    return {
      status: "ambiguous",
      reason: `Login form action "${chosen.action}" is handled by script, not a plain submission`,
    };
  }

  const passwordField = hints.passwordField || firstPasswordInput(chosen);
  if (!passwordField) {
    return {
      status: "ambiguous",
      reason: "Selected form has no password input; pass --password-field to name it",
    };
  }

  const usernameField = hints.usernameField || pickUsernameInput(chosen);
  if (!usernameField) {
    return {
      status: "ambiguous",
      reason: "Selected form has no text or email input for the username; pass --username-field to name it",
    };
  }

  const form: DetectedForm = {
    actionUrl: chosen.action,
    method: chosen.method,
    fieldNames: chosen.fieldNames,
    usernameField,
    passwordField,
    defaults: chosen.defaults,
  };
  return { status: "found", form };
}

// ── Internals ────────────────────────────────────────────────────────────────

function scoreForm(inputs: ScannedInput[]): number {
  const hasPassword = inputs.some((i) => i.type === "password");
  if (!hasPassword) return 0;
  const hasUsername = inputs.some((i) => TEXT_TYPES.has(i.type) && looksLikeUsername(i));
  return hasUsername ? 3 : 2;
}

function looksLikeUsername(input: ScannedInput): boolean {
  return (
    USERNAME_PATTERN.test(input.name) ||
    USERNAME_PATTERN.test(input.id) ||
    USERNAME_PATTERN.test(input.autocomplete)
  );
}

function pickBestForm(forms: ScannedForm[]): ScannedForm | undefined {
  let best: ScannedForm | undefined;
  let bestScore = 0;
  for (const form of forms) {
    const score = scoreForm(form.inputs);
    // strict ">" keeps the earliest form on a tie
    if (score > bestScore) {
      best = form;
      bestScore = score;
    }
  }
  return best;
}

function firstPasswordInput(form: ScannedForm): string | undefined {
  return form.inputs.find((i) => i.type === "password")?.name;
}

function pickUsernameInput(form: ScannedForm): string | undefined {
  const textInputs = form.inputs.filter((i) => TEXT_TYPES.has(i.type));
  return (textInputs.find(looksLikeUsername) ?? textInputs[0])?.name;
}

function resolveBaseUrl($: cheerio.CheerioAPI, pageUrl: string): string {
  const href = $("base[href]").first().attr("href")?.trim();
  if (!href) return pageUrl;
  try {
    return new URL(href, pageUrl).href;
  } catch {
    return pageUrl;
  }
}

function resolveAction(action: string | undefined, pageUrl: string, baseUrl: string): string {
  const raw = action?.trim() ?? "";
  let url: URL;
  try {
    url = raw ? new URL(raw, baseUrl) : new URL(pageUrl);
  } catch {
    url = new URL(pageUrl);
  }
  url.hash = "";
  return url.href;
}

/**
 * Collect every form in document order with its named, enabled controls
 * and the values the browser would submit without user input.
 */
function scanForms($: cheerio.CheerioAPI, pageUrl: string, baseUrl: string): ScannedForm[] {
  const forms: ScannedForm[] = [];

  $("form").each((_, formEl) => {
    const $form = $(formEl);
    const method = ($form.attr("method") ?? "").trim().toLowerCase() === "get" ? "GET" : "POST";
    const inputs: ScannedInput[] = [];
    const fieldNames = new Set<string>();
    const defaults: Record<string, string> = {};
    let submitterTaken = false;

    $form.find("input, select, textarea, button").each((_, el) => {
      const $el = $(el);
      const name = $el.attr("name")?.trim();
      if (!name || $el.attr("disabled") !== undefined) return;

      const tag = el.tagName.toLowerCase();
      const type =
        tag === "input"
          ? ($el.attr("type") ?? "text").trim().toLowerCase() || "text"
          : tag === "button"
            ? ($el.attr("type") ?? "submit").trim().toLowerCase()
            : tag;

      if (tag === "button" || NON_VALUE_TYPES.has(type)) {
        // a browser only sends the button that was clicked: take the first submitter
        if ((type === "submit" || type === "image") && !submitterTaken) {
          submitterTaken = true;
          fieldNames.add(name);
          if (type === "submit") defaults[name] = $el.attr("value") ?? "";
        }
        return;
      }

      fieldNames.add(name);

      if (tag === "select") {
        const $selected = $el.find("option[selected]").first();
        const $option = $selected.length ? $selected : $el.find("option").first();
        if ($option.length) defaults[name] = $option.attr("value") ?? $option.text().trim();
        return;
      }
      if (tag === "textarea") {
        defaults[name] = $el.text();
        return;
      }

      // number, date and the like are submitted but never hold the username
      inputs.push({
        name,
        type,
        id: $el.attr("id") ?? "",
        autocomplete: $el.attr("autocomplete") ?? "",
      });

      if (type === "checkbox" || type === "radio") {
        if ($el.attr("checked") !== undefined) defaults[name] = $el.attr("value") ?? "on";
        return;
      }
      defaults[name] = $el.attr("value") ?? "";
    });

    forms.push({
      action: resolveAction($form.attr("action"), pageUrl, baseUrl),
      method,
      inputs,
      fieldNames,
      defaults,
    });
  });

  return forms;
}
