import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

// The package entry point runs a self-test when loaded without a parent module, so load the library file directly.
const loadPdfParse = async () => (await import("pdf-parse/lib/pdf-parse.js")).default;

export const withTempDocument = async <T>(
  body: Buffer,
  handler: (filePath: string) => Promise<T>,
): Promise<T> => {
  const dir = await mkdtemp(join(tmpdir(), "concall-"));
  const filePath = join(dir, "document.pdf");
  try {
    await writeFile(filePath, body);
    return await handler(filePath);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
};

// pdf-parse renders every page (max: 0) and joins the page texts.
export const readPdfText = async (filePath: string) => {
  const pdfParse = await loadPdfParse();
  const data = await readFile(filePath);
  const result = await pdfParse(data, { max: 0 });
  return result.text;
};
