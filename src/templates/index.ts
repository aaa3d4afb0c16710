/**
 * Journal template loading
 */

import Handlebars from "handlebars";
import { readFile } from "fs/promises";
import { describeError } from "../utils";
import { getDefaultJournalTemplate } from "./defaults";

export { getDefaultJournalTemplate };

export type JournalTemplate = HandlebarsTemplateDelegate;

/**
 * Compile the custom journal template, or the built-in one when no path is set.
 * Output is Markdown, so nothing is HTML-escaped.
 */
export async function loadJournalTemplate(templatePath: string | null): Promise<JournalTemplate> {
  if (templatePath === null) {
    return Handlebars.compile(getDefaultJournalTemplate(), { noEscape: true });
  }

  let source: string;
  try {
    source = await readFile(templatePath, "utf-8");
  } catch (error) {
    throw new Error(`Could not read journal template ${templatePath}: ${describeError(error)}`, {
      cause: error,
    });
  }
  return Handlebars.compile(source, { noEscape: true });
}
