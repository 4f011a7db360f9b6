/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * icons.ts: Channel icon download for desktop notifications.
 */
import type { BoundedFetchOptions } from "./fetch.js";
import { boundedFetch } from "./fetch.js";
import { LOG, formatError } from "../utils/index.js";
import type { Channel } from "../types/index.js";
import fs from "node:fs";
import { getIconsDir } from "../config/paths.js";
import path from "node:path";

const { promises: fsPromises } = fs;

// Extensions we keep from the image URL. Anything else is stored as .png, which is what the catalog serves.
const IMAGE_EXTENSIONS = new Set([ ".gif", ".jpeg", ".jpg", ".png", ".svg", ".webp" ]);

/**
 * Returns the local path of a channel's icon.
 * @param channel - The channel.
 * @param iconsDir - The icon directory.
 * @returns The path, or undefined when the channel has no image.
 */
export function getChannelIconPath(channel: Channel, iconsDir: string = getIconsDir()): string | undefined {

  if(!channel.image) {

    return undefined;
  }

  let extension = ".png";

  try {

    const candidate = path.extname(new URL(channel.image).pathname).toLowerCase();

    if(IMAGE_EXTENSIONS.has(candidate)) {

      extension = candidate;
    }
  } catch {

    return undefined;
  }

  // Catalog ids are plain words, but they end up in a file name, so anything unusual is replaced.
  return path.join(iconsDir, [ channel.id.replace(/[^\w.-]/g, "_"), extension ].join(""));
}

/**
 * Makes sure a channel's icon is on disk, downloading it the first time.
 * @param channel - The channel.
 * @param options - Icon directory, fetch implementation, abort signal and timeout overrides.
 * @returns The icon path, or undefined when the channel has no image or the download failed.
 */
export async function ensureChannelIcon(channel: Channel, options: BoundedFetchOptions & { iconsDir?: string } = {}): Promise<string | undefined> {

  const iconPath = getChannelIconPath(channel, options.iconsDir);

  if(!iconPath || !channel.image) {

    return undefined;
  }

  try {

    await fsPromises.access(iconPath);

    return iconPath;
  } catch {

    // Not downloaded yet.
  }

  try {

    const data = Buffer.from(await boundedFetch(channel.image, options, async (response) => response.arrayBuffer()));

    await fsPromises.mkdir(path.dirname(iconPath), { recursive: true });
    await fsPromises.writeFile(iconPath, data);

    LOG.debug("catalog", "Downloaded icon for %s to %s.", channel.id, iconPath);

    return iconPath;
  } catch(error) {

    LOG.debug("catalog", "Unable to download the icon for %s: %s.", channel.id, formatError(error));

    return undefined;
  }
}
