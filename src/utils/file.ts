import * as fs from "node:fs";
import * as path from "node:path";

/**
 * Check if a folder exists, if not create it.
 * @param folderPath path to the folder
 */
export const checkFolder = (folderPath: string): void => {
  if (!fs.existsSync(folderPath)) {
    fs.mkdirSync(folderPath, { recursive: true });
  }
};

/**
 * Read a text file, or null when it does not exist.
 * Any other read failure is thrown to the caller.
 * @param filePath path to the file
 */
export const readFileIfExists = async (
  filePath: string,
): Promise<string | null> => {
  try {
    return await fs.promises.readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }
};

/**
 * Replace the contents of a file in one step.
 * The data goes to a sibling temp file first, so readers see either the old or the new contents.
 * @param filePath destination file
 * @param data contents to write
 */
export const writeFileAtomic = async (
  filePath: string,
  data: string,
): Promise<void> => {
  checkFolder(path.dirname(filePath));
  const tempPath = `${filePath}.${process.pid}.tmp`;
  try {
    await fs.promises.writeFile(tempPath, data, "utf-8");
    await fs.promises.rename(tempPath, filePath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
};

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";
