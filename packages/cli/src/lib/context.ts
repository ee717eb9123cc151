/**
 * Collaborators shared by every command
 */

import {
  LocalFileStorage,
  createDefaultRegistry,
  type CodecRegistry,
  type IndexStorage,
} from "@blocksplit/sdk";
import { loadConfig, type CliConfig } from "./env.js";

export interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
}

export interface CliContext {
  storage: IndexStorage;
  registry: CodecRegistry;
  config: CliConfig;
}

export function createContext(env: NodeJS.ProcessEnv = process.env): CliContext {
  return {
    storage: new LocalFileStorage(),
    registry: createDefaultRegistry(),
    config: loadConfig(env),
  };
}
