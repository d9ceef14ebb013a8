#!/usr/bin/env node
/**
 * Show Theme Command
 *
 * Resolves a theme through its inheritance chain and prints what the
 * documentation build would use: metadata, parameters, templates, bundles
 * and assets.
 *
 * Usage:
 *   show-theme <name> [--convention dotnet|docfx|devops] [--themes-dir <dir>] [--json]
 *
 * Example:
 *   show-theme modern --convention docfx
 */

import { Command } from "commander";
import { isDocConvention, type DocConvention } from "@apisite/site-schema";
import { getThemesDirectory, loadTheme } from "./theme.js";
import { formatThemeParameters, summarizeTheme } from "./theme-summary.js";
import { SiteError, ThemeValidationError } from "./errors.js";

interface CliOptions {
  convention: string;
  themesDir?: string;
  json: boolean;
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name("show-theme")
    .description("Resolve a documentation theme and print its contents")
    .argument("<name>", "Theme identifier or path to a theme directory")
    .option("--convention <convention>", "Documentation convention (dotnet, docfx, devops)", "dotnet")
    .option("--themes-dir <dir>", "Directory holding the themes, one subdirectory per format")
    .option("--json", "Print the resolved theme as JSON", false)
    .action(async (name: string, options: CliOptions) => {
      if (!isDocConvention(options.convention)) {
        console.error(`❌ Unknown convention: ${options.convention}`);
        process.exit(1);
      }
      const convention: DocConvention = options.convention;

      const theme = await loadTheme(name, { convention, themesDir: options.themesDir });
      const themesDirectory = getThemesDirectory({ convention, themesDir: options.themesDir });

      if (options.json) {
        console.log(JSON.stringify(summarizeTheme(theme, themesDirectory), null, 2));
        return;
      }

      const summary = summarizeTheme(theme, themesDirectory);
      console.log(`\n🎨 Theme: ${summary.metadata?.name ?? theme.id}`);
      console.log(`   Chain: ${summary.chain.join(" -> ")}`);
      if (summary.metadata?.version) console.log(`   Version: ${summary.metadata.version}`);
      if (summary.metadata?.description) console.log(`   ${summary.metadata.description}`);

      console.log(`\n⚙️  Parameters (${theme.parameters.size})`);
      for (const line of formatThemeParameters(theme)) console.log(`   ${line}`);

      console.log(`\n📄 Templates (${theme.templates.size})`);
      for (const [name, file] of Object.entries(summary.templates)) console.log(`   ${name}: ${file}`);

      for (const [label, bundles] of [
        ["📦 Scripts", summary.scripts],
        ["🖌️  Styles", summary.styles],
      ] as const) {
        console.log(`\n${label} (${Object.keys(bundles).length})`);
        for (const [target, files] of Object.entries(bundles)) {
          console.log(`   ${target}`);
          for (const file of files) console.log(`     - ${file}`);
        }
      }

      console.log(`\n🗂️  Assets (${theme.assets.size})`);
      for (const relative of Object.keys(summary.assets)) console.log(`   ${relative}`);
    });

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  if (error instanceof SiteError) {
    console.error(`❌ ${error.message}`);
    if (error instanceof ThemeValidationError) {
      for (const violation of error.errors) console.error(`   - ${violation}`);
    }
  } else {
    console.error("❌ Show theme failed:", error);
  }
  process.exit(1);
});
