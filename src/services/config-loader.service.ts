import * as fs from "fs/promises";
import * as path from "path";

import { parse as parseYaml } from "yaml";

import { CONFIG_KEYS, DEFAULT_CONFIG, LOG_PATTERNS, ORPHAN_POLICIES, YAML_EXTENSIONS } from "../constants";
import { ConfigError, ConfigNotFoundError, ConfigValidationError, getErrorMessage, toError } from "../errors";

import type { Config, ConfigFile, OrphanPolicy } from "../types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isOrphanPolicy(value: unknown): value is OrphanPolicy {
  return ORPHAN_POLICIES.some((policy) => policy === value);
}

export class ConfigLoaderService {
  async loadConfigFile(configPath: string): Promise<ConfigFile> {
    const absolutePath = path.resolve(configPath);

    try {
      await fs.access(absolutePath);
    } catch {
      throw new ConfigNotFoundError(absolutePath);
    }

    let raw: unknown;
    try {
      raw = await this.readRaw(absolutePath);
    } catch (error) {
      throw new ConfigError(`Failed to load config file: ${getErrorMessage(error)}`, "LOAD_FAILED", toError(error));
    }

    this.validateConfigFile(raw);
    return raw;
  }

  private async readRaw(absolutePath: string): Promise<unknown> {
    const extension = path.extname(absolutePath).toLowerCase();
    if (!YAML_EXTENSIONS.some((ext) => ext === extension)) {
      throw new Error(`Unsupported config file type '${extension}'. Use one of: ${YAML_EXTENSIONS.join(", ")}`);
    }

    // YAML is a superset of JSON, so .json files go through the same parser
    const content = await fs.readFile(absolutePath, "utf8");
    return parseYaml(content);
  }

  validateConfigFile(config: unknown): asserts config is ConfigFile {
    if (!isRecord(config)) {
      throw new ConfigValidationError("<root>", "config must be a mapping");
    }

    const emails = config[CONFIG_KEYS.INCLUDE_EMAILS];
    if (!Array.isArray(emails) || emails.length === 0) {
      throw new ConfigValidationError(CONFIG_KEYS.INCLUDE_EMAILS, "must be a non-empty list of email addresses");
    }
    emails.forEach((email: unknown, index: number) => {
      if (typeof email !== "string" || email.length === 0) {
        throw new ConfigValidationError(`${CONFIG_KEYS.INCLUDE_EMAILS}[${index}]`, "must be a non-empty string");
      }
    });

    const projects = config[CONFIG_KEYS.PROJECTS];
    if (!Array.isArray(projects) || projects.length === 0) {
      throw new ConfigValidationError(CONFIG_KEYS.PROJECTS, "must be a non-empty list");
    }

    const seenIds = new Set<string>();
    projects.forEach((project: unknown, index: number) => {
      const field = `${CONFIG_KEYS.PROJECTS}[${index}]`;
      if (!isRecord(project)) {
        throw new ConfigValidationError(field, "must be a mapping");
      }

      const id = project[CONFIG_KEYS.PROJECT_ID];
      if (typeof id !== "string" || !LOG_PATTERNS.PROJECT_ID.test(id)) {
        throw new ConfigValidationError(
          `${field}.${CONFIG_KEYS.PROJECT_ID}`,
          "must be a word of letters, digits or underscores",
        );
      }
      if (seenIds.has(id)) {
        throw new ConfigValidationError(`${field}.${CONFIG_KEYS.PROJECT_ID}`, `duplicate project id '${id}'`);
      }
      seenIds.add(id);

      const gitRoot = project[CONFIG_KEYS.GIT_ROOT];
      if (typeof gitRoot !== "string" || gitRoot.length === 0) {
        throw new ConfigValidationError(`${field}.${CONFIG_KEYS.GIT_ROOT}`, "must be a path");
      }
    });

    const syncRepo = config[CONFIG_KEYS.SYNC_REPO];
    if (typeof syncRepo !== "string" || syncRepo.length === 0) {
      throw new ConfigValidationError(CONFIG_KEYS.SYNC_REPO, "must be a path");
    }

    const policy = config[CONFIG_KEYS.ORPHAN_POLICY];
    if (policy !== undefined && !isOrphanPolicy(policy)) {
      throw new ConfigValidationError(CONFIG_KEYS.ORPHAN_POLICY, `must be one of: ${ORPHAN_POLICIES.join(", ")}`);
    }
  }

  resolveConfig(configFile: ConfigFile, configDir?: string, overrides: Partial<Config> = {}): Config {
    return {
      includeEmails: [...new Set(configFile[CONFIG_KEYS.INCLUDE_EMAILS])],
      projects: configFile.projects.map((project) => ({
        id: project.id,
        gitRoot: this.resolvePath(project[CONFIG_KEYS.GIT_ROOT], configDir),
      })),
      syncRepo: this.resolvePath(configFile[CONFIG_KEYS.SYNC_REPO], configDir),
      orphanPolicy: overrides.orphanPolicy ?? configFile[CONFIG_KEYS.ORPHAN_POLICY] ?? DEFAULT_CONFIG.ORPHAN_POLICY,
      dryRun: overrides.dryRun ?? false,
      debug: overrides.debug ?? false,
      logger: overrides.logger,
    };
  }

  async load(configPath: string, overrides: Partial<Config> = {}): Promise<Config> {
    const configFile = await this.loadConfigFile(configPath);
    const configDir = path.dirname(path.resolve(configPath));
    return this.resolveConfig(configFile, configDir, overrides);
  }

  private resolvePath(inputPath: string, baseDir?: string): string {
    if (path.isAbsolute(inputPath)) {
      return inputPath;
    }

    return path.resolve(baseDir || process.cwd(), inputPath);
  }
}
