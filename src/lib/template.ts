import { chmod, copyFile, mkdir, readdir, readFile, stat, writeFile } from "fs/promises";
import { join } from "path";
import Handlebars from "handlebars";

const TEMPLATE_SUFFIX = ".hbs";

// npm drops .gitignore files from published packages
const RENAMES: Record<string, string> = {
  gitignore: ".gitignore",
};

/**
 * Copy a template directory to `dest`, rendering `*.hbs` files with
 * Handlebars. `dest` must not exist yet.
 */
export async function renderTemplate(
  templateDir: string,
  dest: string,
  variables: Record<string, unknown>
): Promise<string[]> {
  await mkdir(dest);
  const written: string[] = [];
  await copyDir(templateDir, dest, variables, written);
  return written;
}

async function copyDir(
  from: string,
  to: string,
  variables: Record<string, unknown>,
  written: string[]
): Promise<void> {
  const entries = await readdir(from, { withFileTypes: true });

  for (const entry of entries) {
    const source = join(from, entry.name);

    if (entry.isDirectory()) {
      const target = join(to, entry.name);
      await mkdir(target, { recursive: true });
      await copyDir(source, target, variables, written);
      continue;
    }

    if (!entry.isFile()) {
      continue;
    }

    if (entry.name.endsWith(TEMPLATE_SUFFIX)) {
      const target = join(to, targetName(entry.name.slice(0, -TEMPLATE_SUFFIX.length)));
      const template = Handlebars.compile(await readFile(source, "utf8"));
      await writeFile(target, template(variables));
      await chmod(target, (await stat(source)).mode);
      written.push(target);
    } else {
      const target = join(to, targetName(entry.name));
      await copyFile(source, target);
      written.push(target);
    }
  }
}

function targetName(name: string): string {
  return Object.prototype.hasOwnProperty.call(RENAMES, name) ? RENAMES[name] : name;
}
