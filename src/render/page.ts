/**
 * page renderer: publication plan → static HTML via a Handlebars template.
 * titles and bodies are markdown rendered by marked and emitted with `{{{ }}}`;
 * site title, dates and details go through `{{ }}` and are escaped.
 *
 * raw HTML inside markdown is escaped, and links that are not http(s),
 * mailto or relative are neutralized to `#`.
 */

import { readFileSync } from "fs";
import Handlebars from "handlebars";
import { Marked } from "marked";
import type { IsoDate } from "../dates.js";
import type { PublicationPlan } from "../planner.js";
import type { EventRecord } from "../schema.js";

export const DEFAULT_TEMPLATE_PATH = new URL("../../templates/page.hbs", import.meta.url);

export interface EventView {
  titleHtml: string;
  details: string;
  /** empty when the event has no body beyond its title. */
  bodyHtml: string;
}

export interface SectionView {
  heading: string;
  events: EventView[];
}

export interface PageView {
  siteTitle: string;
  today: IsoDate;
  sections: SectionView[];
}

export interface RenderOptions {
  siteTitle: string;
  today: IsoDate;
  /** template source; the bundled page.hbs when omitted. */
  template?: string;
}

const SAFE_HREF = /^(?:https?:|mailto:|#|\/)/i;

const markdown = new Marked({
  walkTokens(token) {
    if (token.type === "html") {
      token.text = Handlebars.escapeExpression(token.raw);
    } else if ((token.type === "link" || token.type === "image") && !SAFE_HREF.test(token.href)) {
      token.href = "#";
    }
  },
});

export function renderMarkdown(text: string, options: { inline: boolean }): string {
  const html = options.inline
    ? markdown.parseInline(text, { async: false })
    : markdown.parse(text, { async: false });
  if (typeof html !== "string") {
    throw new Error("markdown rendering returned a promise");
  }
  return html.trim();
}

/** untitled events borrow their first body line as the title. */
function titleAndRest(record: EventRecord): { title: string; rest: string } {
  if (record.title) return { title: record.title, rest: record.body };

  const body = record.body.trim();
  if (!body) return { title: record.identity, rest: "" };

  const newline = body.indexOf("\n");
  return newline === -1
    ? { title: body, rest: "" }
    : { title: body.slice(0, newline).trim(), rest: body.slice(newline + 1).trim() };
}

export function toEventView(record: EventRecord): EventView {
  const details = [record.target, record.time, record.place].filter(
    (part): part is string => part !== undefined,
  );
  const { title, rest } = titleAndRest(record);

  return {
    titleHtml: renderMarkdown(title, { inline: true }),
    details: details.join(" · "),
    bodyHtml: rest ? renderMarkdown(rest, { inline: false }) : "",
  };
}

export function buildPageView(plan: PublicationPlan, options: Omit<RenderOptions, "template">): PageView {
  return {
    siteTitle: options.siteTitle,
    today: options.today,
    sections: [
      { heading: "This Week", events: plan.thisWeek.map(toEventView) },
      { heading: "Upcoming", events: plan.upcoming.map(toEventView) },
    ],
  };
}

export function loadDefaultTemplate(): string {
  return readFileSync(DEFAULT_TEMPLATE_PATH, "utf-8");
}

export function renderPage(plan: PublicationPlan, options: RenderOptions): string {
  const template = Handlebars.compile<PageView>(options.template ?? loadDefaultTemplate());
  return template(buildPageView(plan, options));
}
