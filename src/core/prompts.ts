/*
Purpose: render the prompt that asks the model for a uv-runnable script.
Assumptions: the template ships at templates/prompts/generate-script.md under the package root.
Usage: const prompt = await renderScriptPrompt({ request, descriptionLiteral });
*/

import path from "node:path";
import { fileURLToPath } from "node:url";

import fse from "fs-extra";
import Handlebars from "handlebars";

import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

export type ScriptPromptValues = {
  /** The user's request, verbatim. */
  request: string;
  /** The header description as a quoted TOML string. */
  descriptionLiteral: string;
};

export const SCRIPT_PROMPT_FILE = path.join("templates", "prompts", "generate-script.md");

let compiled: Promise<Handlebars.TemplateDelegate<ScriptPromptValues>> | undefined;

export async function renderScriptPrompt(values: ScriptPromptValues): Promise<string> {
  compiled ??= compileScriptPrompt().catch((err: unknown) => {
    compiled = undefined;
    throw err;
  });
  const template = await compiled;

  try {
    return template(values).trim();
  } catch (err) {
    throw promptError("Prompt template failed to render.", "The script prompt could not be rendered.", err);
  }
}

async function compileScriptPrompt(): Promise<Handlebars.TemplateDelegate<ScriptPromptValues>> {
  const templatePath = path.join(findPackageRoot(), SCRIPT_PROMPT_FILE);

  let raw: string;
  try {
    raw = await fse.readFile(templatePath, "utf8");
  } catch (err) {
    throw promptError("Prompt template missing.", `Could not read the script prompt at ${templatePath}.`, err);
  }

  try {
    // strict: a placeholder without a value throws at render time.
    return Handlebars.compile<ScriptPromptValues>(raw, { noEscape: true, strict: true });
  } catch (err) {
    throw promptError("Prompt template invalid.", `${templatePath} is not a valid Handlebars template.`, err);
  }
}

// Sources and dist/ both sit below package.json.
function findPackageRoot(): string {
  const startDir = path.dirname(fileURLToPath(import.meta.url));
  let current = startDir;
  for (;;) {
    if (fse.pathExistsSync(path.join(current, "package.json"))) return current;
    const parent = path.dirname(current);
    if (parent === current) {
      throw promptError("Prompt template missing.", `No package.json above ${startDir}.`);
    }
    current = parent;
  }
}

function promptError(title: string, message: string, cause?: unknown): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.script,
    title,
    message,
    hint: `Reinstall script-inventory so ${SCRIPT_PROMPT_FILE} is present.`,
    cause,
  });
}
