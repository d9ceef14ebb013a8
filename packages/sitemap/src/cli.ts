#!/usr/bin/env node
/**
 * Build Sitemap Command
 *
 * Reads a documentation model, builds the site's navigation tree and writes
 * it as JSON. With a theme, it also reports the number of generation steps
 * and can write the navigation prelude of the first script bundle.
 *
 * Usage:
 *   build-sitemap <model.json> [--convention <c>] [--base-url <url>] [--output <file>]
 *                 [--theme <name>] [--themes-dir <dir>] [--script <file>]
 *
 * Example:
 *   build-sitemap ./model.json --convention docfx --output ./site/sitemap.json
 */

import { Command } from "commander";
import { isDocConvention, type DocConvention } from "@apisite/site-schema";
import { SiteError, ThemeValidationError } from "@apisite/theme-engine";
import { buildSitemapFiles } from "./build-sitemap.js";
import { ModelValidationError } from "./errors.js";

interface CliOptions {
  convention: string;
  baseUrl?: string;
  output?: string;
  theme?: string;
  themesDir?: string;
  script?: string;
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name("build-sitemap")
    .description("Build the navigation tree of a documentation site")
    .argument("<model>", "Path to the documentation model JSON file")
    .option("--convention <convention>", "Documentation convention (dotnet, docfx, devops)", "dotnet")
    .option("--base-url <url>", "Root URL of the site")
    .option("--output <file>", "Write the sitemap JSON to a file instead of stdout")
    .option("--theme <name>", "Theme used to count generation steps")
    .option("--themes-dir <dir>", "Directory holding the themes, one subdirectory per format")
    .option("--script <file>", "Write the navigation prelude script (requires --theme)")
    .action(async (modelPath: string, options: CliOptions) => {
      if (!isDocConvention(options.convention)) {
        console.error(`❌ Unknown convention: ${options.convention}`);
        process.exit(1);
      }
      if (options.script && !options.theme) {
        console.error("❌ --script requires --theme");
        process.exit(1);
      }
      const convention: DocConvention = options.convention;

      // stdout carries the sitemap when no output file is given
      const report = (line: string): void => {
        if (options.output) console.log(line);
        else console.error(line);
      };

      const result = await buildSitemapFiles(modelPath, {
        convention,
        baseUrl: options.baseUrl,
        output: options.output,
        theme: options.theme,
        themesDir: options.themesDir,
        script: options.script,
        logger: { log: report, warn: report },
      });

      if (!options.output) console.log(result.json);
      for (const file of result.written) report(`✅ Written ${file}`);
      report(`📄 Pages: ${result.sitemap.pageCount}`);
      if (result.generationSteps !== undefined) {
        report(`🧮 Generation steps with theme '${options.theme}': ${result.generationSteps}`);
      }
    });

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  if (error instanceof SiteError) {
    console.error(`❌ ${error.message}`);
    if (error instanceof ModelValidationError || error instanceof ThemeValidationError) {
      for (const violation of error.errors) console.error(`   - ${violation}`);
    }
  } else {
    console.error("❌ Build sitemap failed:", error);
  }
  process.exit(1);
});
