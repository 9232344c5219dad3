/**
 * Cursor Installer Engine — Optional Module Loader
 *
 * Some modules are only needed on a fallback path (pngjs renders the
 * placeholder icon). They are looked up in the installed tree first, then
 * under a user-scoped npm prefix. A module found in neither place is
 * installed into that prefix with `npm install --prefix`, which never needs
 * elevated privileges.
 */

import * as fs from "fs";
import * as path from "path";
import type { Logger } from "./utils/logger";
import { runCommand, type CommandRunner } from "./utils/command";
import { InstallerError, errorMessage } from "./errors";

export type ModuleResolver = (name: string, searchPaths: string[]) => string;

const nodeResolver: ModuleResolver = (name, searchPaths) =>
  require.resolve(name, { paths: searchPaths });

export interface ModuleLoaderOptions {
  /** npm --prefix for user-scoped installs */
  prefix: string;
  logger: Logger;
  runner?: CommandRunner;
  resolver?: ModuleResolver;
}

export interface EnsureResult {
  present: string[];
  installed: string[];
}

export class ModuleLoader {
  private prefix: string;
  private logger: Logger;
  private runner: CommandRunner;
  private resolver: ModuleResolver;

  constructor(options: ModuleLoaderOptions) {
    this.prefix = options.prefix;
    this.logger = options.logger;
    this.runner = options.runner ?? runCommand;
    this.resolver = options.resolver ?? nodeResolver;
  }

  private searchPaths(): string[] {
    return [__dirname, this.prefix];
  }

  /**
   * Resolve a module to a file path, or null if it is not importable.
   */
  resolve(name: string): string | null {
    try {
      return this.resolver(name, this.searchPaths());
    } catch {
      return null;
    }
  }

  /**
   * Make sure every module in `names` resolves, installing the missing ones.
   */
  async ensure(names: string[]): Promise<EnsureResult> {
    const result: EnsureResult = { present: [], installed: [] };

    for (const name of names) {
      if (this.resolve(name)) {
        this.logger.debug({ module: name }, "Module already available");
        result.present.push(name);
        continue;
      }

      this.logger.info(
        { module: name, prefix: this.prefix },
        "Module not found. Installing into user prefix",
      );
      await this.install(name);

      if (!this.resolve(name)) {
        throw new InstallerError(
          "DEPENDENCY_ERROR",
          `Module "${name}" is still not importable after installing it into ${this.prefix}`,
        );
      }

      this.logger.info({ module: name }, "Module installed");
      result.installed.push(name);
    }

    return result;
  }

  /**
   * Load a module, installing it first if needed.
   */
  async load<T>(name: string): Promise<T> {
    let resolved = this.resolve(name);
    if (!resolved) {
      await this.ensure([name]);
      resolved = this.resolve(name);
    }
    if (!resolved) {
      throw new InstallerError(
        "DEPENDENCY_ERROR",
        `Module "${name}" could not be resolved`,
      );
    }
    const loaded: T = require(resolved);
    return loaded;
  }

  private async install(name: string): Promise<void> {
    try {
      fs.mkdirSync(this.prefix, { recursive: true });
      await this.runner("npm", [
        "install",
        "--prefix",
        this.prefix,
        "--no-save",
        "--no-audit",
        "--no-fund",
        name,
      ]);
    } catch (err: unknown) {
      throw new InstallerError(
        "DEPENDENCY_ERROR",
        `Failed to install ${name}: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }

  /** node_modules directory under the user prefix */
  get modulesDir(): string {
    return path.join(this.prefix, "node_modules");
  }
}
