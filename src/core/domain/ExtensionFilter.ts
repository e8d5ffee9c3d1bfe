import { extname } from "node:path";

/**
 * Extension of a file name without the dot, lower-cased.
 * Dotfiles such as ".jpg" have no extension.
 */
export const extensionOf = (fileName: string): string =>
  extname(fileName).slice(1).toLowerCase();

export const hasAcceptedExtension = (
  fileName: string,
  extensions: ReadonlySet<string>
): boolean => {
  const ext = extensionOf(fileName);
  return ext.length > 0 && extensions.has(ext);
};

export const filterByExtension = (
  names: readonly string[],
  extensions: ReadonlySet<string>
): readonly string[] => names.filter((name) => hasAcceptedExtension(name, extensions));
