import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { isAbsolute, join } from "path";
import {
  DEFAULT_MPV_BINARY,
  DEFAULT_MPV_SOCKET,
  DEFAULT_PLAYLIST_FILENAME,
  DEFAULT_RESOLVER_BINARY,
} from "../config/constants";
import { ConfigFileSchema, type ConfigFile } from "../schemas";
import { getLogger } from "../utils";

const logger = getLogger("ConfigService");

/**
 * Effective application configuration
 */
export interface AppConfig {
  youtubeApiKey: string | undefined;
  mpvPath: string;
  mpvSocket: string;
  resolverPath: string;
  playlistFile: string;
  /** Reject adding a video that is already in the playlist */
  dedupePlaylist: boolean;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  logger.warn(`Ignoring unrecognised boolean "${value}"`);
  return undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Configuration service
 * Reads ~/.config/tubeplay/config.json and overlays environment variables
 */
export class ConfigService {
  private configPath: string;
  private home: string;

  constructor(private env: NodeJS.ProcessEnv = process.env) {
    this.home = env.HOME || homedir();
    // Use XDG_CONFIG_HOME if available, otherwise ~/.config
    const configHome = env.XDG_CONFIG_HOME || join(this.home, ".config");
    this.configPath = join(configHome, "tubeplay", "config.json");
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load config.json. A missing file is an empty config; an unreadable or
   * invalid one is logged and ignored.
   */
  loadConfigFile(): ConfigFile {
    if (!existsSync(this.configPath)) {
      return {};
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.configPath, "utf-8"));
    } catch (error) {
      logger.warn(`Could not read ${this.configPath}:`, error);
      return {};
    }

    const result = ConfigFileSchema.safeParse(raw);
    if (!result.success) {
      const problems = result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      logger.warn(`Ignoring invalid ${this.configPath}: ${problems}`);
      return {};
    }
    return result.data;
  }

  /**
   * Resolve the effective configuration: environment over config.json over
   * built-in defaults
   */
  load(): AppConfig {
    const file = this.loadConfigFile();
    const env = this.env;

    const playlistFile =
      nonEmpty(env.TUBEPLAY_PLAYLIST) ?? file.playlistFile ?? DEFAULT_PLAYLIST_FILENAME;

    return {
      youtubeApiKey: nonEmpty(env.YOUTUBE_API_KEY) ?? file.youtubeApiKey,
      mpvPath: nonEmpty(env.TUBEPLAY_MPV_PATH) ?? file.mpvPath ?? DEFAULT_MPV_BINARY,
      mpvSocket: nonEmpty(env.TUBEPLAY_MPV_SOCKET) ?? file.mpvSocket ?? DEFAULT_MPV_SOCKET,
      resolverPath:
        nonEmpty(env.TUBEPLAY_RESOLVER) ?? file.resolverPath ?? DEFAULT_RESOLVER_BINARY,
      playlistFile: this.resolvePath(playlistFile),
      dedupePlaylist: parseBoolean(env.TUBEPLAY_DEDUPE) ?? file.dedupePlaylist ?? false,
    };
  }

  /**
   * Relative paths and "~/" are taken from the home directory
   */
  private resolvePath(path: string): string {
    if (path === "~") return this.home;
    if (path.startsWith("~/")) return join(this.home, path.slice(2));
    return isAbsolute(path) ? path : join(this.home, path);
  }
}

let configServiceInstance: ConfigService | null = null;

export function getConfigService(): ConfigService {
  if (!configServiceInstance) {
    configServiceInstance = new ConfigService();
  }
  return configServiceInstance;
}
