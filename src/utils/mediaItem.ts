import path from "node:path";

import {
  extensionAliases,
  imageExtensions,
  videoExtensions,
} from "@/constants";
import type { MediaCategory, MediaItem } from "@/types";

const imageExtSet: ReadonlySet<string> = new Set(imageExtensions);
const videoExtSet: ReadonlySet<string> = new Set(videoExtensions);

export function canonicalExtension(filePath: string) {
  const ext = path.extname(filePath).slice(1).toLowerCase();
  return extensionAliases[ext] ?? ext;
}

export function categoryOf(filePath: string): MediaCategory | undefined {
  const ext = path.extname(filePath).toLowerCase();
  if (imageExtSet.has(ext)) return "image";
  if (videoExtSet.has(ext)) return "video";
  return undefined;
}

export function createMediaItem(filePath: string): MediaItem {
  return Object.freeze({
    filePath,
    fileName: path.basename(filePath),
    extension: canonicalExtension(filePath),
    category: categoryOf(filePath),
  });
}
