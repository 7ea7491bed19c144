import { existsSync, readdirSync } from "fs";
import { join } from "path";
import { pathToFileURL } from "url";
import type { Plugin, ProcessMessages } from "./types";
import { logProxyWarn, logProxyError } from "../utils/logger";

const PLUGIN_EXTENSIONS = [".ts", ".js"];

interface PluginExport {
  name?: unknown;
  process: ProcessMessages;
}

function isPluginExport(value: unknown): value is PluginExport {
  return typeof value === "object" && value !== null && "process" in value && typeof value.process === "function";
}

// A plugin lives at <dir>/<name>/<name>.ts; anything else in the directory is ignored.
function findPluginFiles(pluginsDir: string): { dir: string; file: string }[] {
  return readdirSync(pluginsDir, { withFileTypes: true })
    .filter(entry => entry.isDirectory())
    .map(entry => entry.name)
    .sort()
    .flatMap(dir => {
      const file = PLUGIN_EXTENSIONS
        .map(ext => `${dir}/${dir}${ext}`)
        .find(candidate => existsSync(join(pluginsDir, candidate)));
      return file ? [{ dir, file }] : [];
    });
}

export async function loadPlugins(pluginsDir: string): Promise<Plugin[]> {
  const loadedPlugins: Plugin[] = [];

  for (const { dir, file } of findPluginFiles(pluginsDir)) {
    try {
      const pluginModule: unknown = await import(pathToFileURL(join(pluginsDir, file)).href);
      const plugin = typeof pluginModule === "object" && pluginModule !== null && "default" in pluginModule
        ? pluginModule.default
        : pluginModule;

      if (isPluginExport(plugin)) {
        const run = plugin.process;
        loadedPlugins.push({
          name: typeof plugin.name === "string" && plugin.name ? plugin.name : dir,
          process: (messages, conversationId) => run.call(plugin, messages, conversationId),
        });
      } else {
        logProxyWarn("PluginLoader", `Skipping ${file}: missing process function`);
      }
    } catch (e) {
      logProxyError("PluginLoader", `Failed to load ${file}`, e);
    }
  }

  return loadedPlugins;
}
