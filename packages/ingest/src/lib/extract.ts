import { DOCUMENT_HEADERS } from "../config/sources";
import { fetchBufferWithRetry, type FetchLike } from "./fetcher";
import { emptyFields, extractFieldsFromText } from "./fields";
import { createLogger, describeError } from "./log";
import { normalizeWhitespace } from "./normalize";
import { readPdfText, withTempDocument } from "./pdf";
import type { RetrySettings } from "./settings";
import type { ExtractedFields } from "./types";

export type ExtractorDeps = {
  fetchImpl?: FetchLike;
  wait?: (ms: number) => Promise<void>;
  readText?: (filePath: string) => Promise<string>;
};

export type DocumentExtractor = {
  extractFields: (documentUrl: string) => Promise<ExtractedFields>;
};

const log = createLogger("extract");

export const createDocumentExtractor = (
  retry: RetrySettings,
  deps: ExtractorDeps = {},
): DocumentExtractor => {
  const readText = deps.readText ?? readPdfText;

  const extractFields = async (documentUrl: string): Promise<ExtractedFields> => {
    if (!documentUrl) {
      log.warn("Entry has no document link; skipping extraction.");
      return emptyFields();
    }

    log.info(`Downloading document: ${documentUrl}`);
    try {
      const { body, attempts } = await fetchBufferWithRetry(documentUrl, {
        ...retry,
        headers: DOCUMENT_HEADERS,
        fetchImpl: deps.fetchImpl,
        wait: deps.wait,
      });
      log.info(`Document downloaded (attempt ${attempts}, ${body.length} bytes).`);

      const text = normalizeWhitespace(await withTempDocument(body, readText));
      if (!text) {
        log.warn("Document appears empty or OCR-based; no text layer to search.");
        return emptyFields();
      }

      const fields = extractFieldsFromText(text);
      log.success("Extracted document details.");
      return fields;
    } catch (error) {
      log.error(`Extraction failed for ${documentUrl}: ${describeError(error)}`);
      return emptyFields();
    }
  };

  return { extractFields };
};
