import path from "node:path";

// ============================================================================
// OUTPUT UTILITIES
// ============================================================================

/**
 * Default plot file: next to the input, "<name>.plots.html"
 */
export function getDefaultPlotPath(inputPath: string): string {
    const absolutePath = path.resolve(inputPath);
    const pathInfo = path.parse(absolutePath);
    return path.join(pathInfo.dir, `${pathInfo.name}.plots.html`);
}
