import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";

export async function writePage(html: string, outputPath: string): Promise<void> {
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, html, "utf8");
}
