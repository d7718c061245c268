import * as fs from 'fs'
import * as path from 'path'

export const OUTPUT_SUFFIX = 'zh-Hant'

/**
 * Utility functions for file operations
 */
export class FileUtils {
  /**
   * Check if a file exists
   * @param filePath Path to the file
   */
  public static async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.promises.access(filePath, fs.constants.F_OK)
      return true
    } catch {
      return false
    }
  }

  /**
   * Generate an output file path beside the input file, e.g. `movie.srt` -> `movie-zh-Hant.srt`
   */
  public static generateOutputPath(inputPath: string, suffix: string = OUTPUT_SUFFIX): string {
    const parsedPath = path.parse(inputPath)
    return path.join(parsedPath.dir, `${parsedPath.name}-${suffix}${parsedPath.ext || '.srt'}`)
  }

  /**
   * Validate that a file has the .srt extension
   */
  public static isSrtFile(filePath: string): boolean {
    return path.extname(filePath).toLowerCase() === '.srt'
  }

  /**
   * Append `.srt` to an output name that lacks it
   */
  public static ensureSrtExtension(filePath: string): string {
    return FileUtils.isSrtFile(filePath) ? filePath : `${filePath}.srt`
  }
}
