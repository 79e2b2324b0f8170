import { existsSync, readFileSync } from "node:fs";
import { dirname } from "node:path";
import ts from "typescript";
import type { Logger } from "@wirekit/generator";
import { ConfigError } from "./config.js";

/**
 * Create a TypeScript program from a tsconfig.json, the way `tsc -p` would see it.
 */
export function createProgramFromTsconfig(tsconfigPath: string, logger: Logger): ts.Program {
  if (!existsSync(tsconfigPath)) {
    throw new ConfigError("tsconfig not found", tsconfigPath);
  }

  const configFile = ts.readConfigFile(tsconfigPath, (path) => readFileSync(path, "utf-8"));
  if (configFile.error) {
    const message = ts.flattenDiagnosticMessageText(configFile.error.messageText, "\n");
    throw new ConfigError(`failed to read tsconfig: ${message}`, tsconfigPath);
  }

  const parsed = ts.parseJsonConfigFileContent(configFile.config, ts.sys, dirname(tsconfigPath));
  for (const error of parsed.errors) {
    logger.warn(`[wirekit] tsconfig: ${ts.flattenDiagnosticMessageText(error.messageText, "\n")}`);
  }

  logger.info(`[wirekit] Creating TypeScript program (${parsed.fileNames.length} files)`);
  return ts.createProgram(parsed.fileNames, parsed.options);
}
