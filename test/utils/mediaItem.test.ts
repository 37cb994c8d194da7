import { describe, expect, test } from "vitest";

import {
  canonicalExtension,
  categoryOf,
  createMediaItem,
} from "@/utils/mediaItem";

describe("mediaItem", () => {
  test.each([
    ["photo.JPEG", "jpg"],
    ["clip.TIFF", "tif"],
    ["a.jpeg", "jpg"],
    ["b.PNG", "png"],
    ["c.MOV", "mov"],
    ["d.tif", "tif"],
  ])("%s 的正規化副檔名為 %s", (file, ext) => {
    expect(canonicalExtension(file)).toBe(ext);
  });

  test("依副檔名判斷類別，不分大小寫", () => {
    expect(categoryOf("/a/IMG_0001.JPG")).toBe("image");
    expect(categoryOf("/a/clip.Mp4")).toBe("video");
    expect(categoryOf("/a/notes.txt")).toBeUndefined();
    expect(categoryOf("/a/no-extension")).toBeUndefined();
  });

  test("createMediaItem 帶出檔名、副檔名與類別", () => {
    expect(createMediaItem("/media/2024/photo.JPEG")).toEqual({
      filePath: "/media/2024/photo.JPEG",
      fileName: "photo.JPEG",
      extension: "jpg",
      category: "image",
    });
  });
});
