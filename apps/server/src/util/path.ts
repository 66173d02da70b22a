/**
 * Asset path utilities
 *
 * Paths are flat strings with "/" separators. Directory nodes of the path
 * index carry a trailing "/"; the root directory is "".
 */

import { isAssetPath } from "@dandiset/protocol";

export const isValidAssetPath = isAssetPath;

/**
 * Parent directory of a node path: "a/b/c" -> "a/b/", "a/b/" -> "a/", "a" -> ""
 */
export const parentOf = (path: string): string => {
  const trimmed = path.endsWith("/") ? path.slice(0, -1) : path;
  const index = trimmed.lastIndexOf("/");
  return index < 0 ? "" : trimmed.slice(0, index + 1);
};

/**
 * Last segment of a node path, keeping the trailing "/" of directories
 */
export const nameOf = (path: string): string => path.slice(parentOf(path).length);

/**
 * Every proper directory prefix of an asset path, root first:
 * "a/b/c.nwb" -> ["", "a/", "a/b/"]
 */
export const ancestorsOf = (path: string): string[] => {
  const result = [""];
  let index = path.indexOf("/");
  while (index >= 0) {
    result.push(path.slice(0, index + 1));
    index = path.indexOf("/", index + 1);
  }
  return result;
};

/**
 * Compile a "*" glob over full paths into an anchored regular expression
 */
export const globToRegExp = (glob: string): RegExp => {
  const escaped = glob
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${escaped}$`);
};
