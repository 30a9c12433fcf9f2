import * as fs from "node:fs";
import * as path from "node:path";
import JSZip from "jszip";

export interface ArchiveEntry {
  name: string;
  sourcePath: string;
}

/**
 * Bundle already-rendered files into a single zip. Page images are
 * compressed formats already, so entries are stored rather than deflated.
 */
export async function writeZipArchive(
  entries: ArchiveEntry[],
  outputPath: string,
): Promise<void> {
  const zip = new JSZip();
  for (const entry of entries) {
    zip.file(entry.name, await fs.promises.readFile(entry.sourcePath), {
      compression: "STORE",
    });
  }
  const content = await zip.generateAsync({ type: "nodebuffer" });
  await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.promises.writeFile(outputPath, content);
}
