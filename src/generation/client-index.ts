import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import fse from "fs-extra";
import Handlebars from "handlebars";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { writeTextFile } from "../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type ClientIndexZone = {
  zone: string;
  title: string;
  basePath: string;
};

export type ClientIndexInput = {
  language: string;
  languageDir: string;
  zones: ClientIndexZone[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

// Renders <languageDir>/index.ts re-exporting each zone client's own index.
export async function writeClientIndex(input: ClientIndexInput): Promise<string> {
  const content = await renderClientIndex(input.language, input.zones);
  const target = path.join(input.languageDir, "index.ts");
  await writeTextFile(target, content);
  return target;
}

export async function renderClientIndex(language: string, zones: ClientIndexZone[]): Promise<string> {
  const template = await loadTemplate();
  const values = {
    language,
    zones: [...zones]
      .sort((a, b) => (a.zone < b.zone ? -1 : a.zone > b.zone ? 1 : 0))
      .map((zone) => ({
        zone: zone.zone,
        identifier: zoneIdentifier(zone.zone),
        meta: JSON.stringify({ name: zone.zone, title: zone.title, basePath: zone.basePath }),
      })),
  };

  try {
    return `${template(values).trim()}\n`;
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.generation,
      title: "Client index failed to render.",
      message: `The ${language} client index could not be rendered.`,
      hint: INDEX_TEMPLATE_HINT,
      cause: err,
    });
  }
}

// "partner_v2" -> "partnerV2Client"; never a reserved word, never a leading digit.
export function zoneIdentifier(zone: string): string {
  const words = zone.split(/[^A-Za-z0-9]+/).filter((word) => word.length > 0);
  const camel = words
    .map((word, index) =>
      index === 0 ? word.toLowerCase() : word.charAt(0).toUpperCase() + word.slice(1).toLowerCase(),
    )
    .join("");
  const base = /^[0-9]/.test(camel) || camel.length === 0 ? `zone${camel}` : camel;
  return `${base}Client`;
}

// =============================================================================
// INTERNALS
// =============================================================================

const TEMPLATE_FILE = "client-index.ts.hbs";
const INDEX_TEMPLATE_HINT = "Ensure templates/client-index.ts.hbs ships with the package.";

let cachedTemplate: Handlebars.TemplateDelegate | null = null;

async function loadTemplate(): Promise<Handlebars.TemplateDelegate> {
  if (cachedTemplate) return cachedTemplate;

  const templatePath = path.join(findPackageRoot(moduleDir()), "templates", TEMPLATE_FILE);
  let raw: string;
  try {
    raw = await fse.readFile(templatePath, "utf8");
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.generation,
      title: "Client index template unreadable.",
      message: `Failed to read the client index template at ${templatePath}.`,
      hint: INDEX_TEMPLATE_HINT,
      cause: err,
    });
  }

  cachedTemplate = Handlebars.compile(raw, { noEscape: true, strict: true });
  return cachedTemplate;
}

function moduleDir(): string {
  return fileURLToPath(new URL(".", import.meta.url));
}

// Walk upward until package.json so compiled builds under dist/ resolve templates too.
function findPackageRoot(startDir: string): string {
  let current = startDir;

  while (true) {
    if (fs.existsSync(path.join(current, "package.json"))) return current;

    const parent = path.dirname(current);
    if (parent === current) break;

    current = parent;
  }

  throw new UserFacingError({
    code: USER_FACING_ERROR_CODES.generation,
    title: "Client index template unavailable.",
    message: `package.json not found while resolving templates from ${startDir}.`,
    hint: INDEX_TEMPLATE_HINT,
  });
}
