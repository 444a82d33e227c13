import PizZip from "pizzip";
import Docxtemplater from "docxtemplater";
import { BadRequestError, InvalidFileError, getErrorMessage } from "../utils/errors.js";

const VARIABLE_PATTERN = /\{\{([^}]+)\}\}/g;

// Section tags ({{#list}} … {{/list}}) and raw-xml tags are not plain variables.
const NON_VARIABLE_PREFIXES = ["#", "/", "^", "@"];

export type TemplateData = Record<string, unknown>;

function loadTemplate(buffer: Buffer): Docxtemplater {
  try {
    const zip = new PizZip(buffer);
    return new Docxtemplater(zip, {
      paragraphLoop: true,
      linebreaks: true,
      delimiters: { start: "{{", end: "}}" },
      // "{{ name }}" and "{{name}}" address the same variable
      parser: (tag: string) => ({
        get: (scope: TemplateData) => (tag === "." ? scope : scope[tag.trim()]),
      }),
    });
  } catch (error) {
    throw new InvalidFileError(`Could not load template: ${getErrorMessage(error)}`, {
      cause: error,
    });
  }
}

/** Names of the `{{variable}}` placeholders in the document body, sorted and unique. */
export function extractVariables(buffer: Buffer): string[] {
  const text = loadTemplate(buffer).getFullText();
  const names = new Set<string>();

  for (const match of text.matchAll(VARIABLE_PATTERN)) {
    const name = match[1].trim();
    if (name && !NON_VARIABLE_PREFIXES.some((prefix) => name.startsWith(prefix))) {
      names.add(name);
    }
  }

  return [...names].sort();
}

export function findMissing(variables: string[], data: TemplateData): string[] {
  return variables.filter((name) => !Object.prototype.hasOwnProperty.call(data, name));
}

function stringify(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  return JSON.stringify(value);
}

/**
 * Fills the template. In strict mode every placeholder needs a value;
 * otherwise missing ones render empty.
 *
 * @throws BadRequestError listing the missing variables (strict mode)
 */
export function renderTemplate(
  buffer: Buffer,
  data: TemplateData,
  { strict = true }: { strict?: boolean } = {}
): Buffer {
  const variables = extractVariables(buffer);
  const missing = findMissing(variables, data);
  if (strict && missing.length > 0) {
    throw new BadRequestError(`Missing required variables: ${missing.join(", ")}`);
  }

  const values: Record<string, string> = {};
  for (const name of variables) values[name] = stringify(data[name]);

  const doc = loadTemplate(buffer);
  try {
    doc.render(values);
  } catch (error) {
    throw new BadRequestError(`Error processing template: ${getErrorMessage(error)}`);
  }

  return doc.getZip().generate({ type: "nodebuffer", compression: "DEFLATE" });
}
