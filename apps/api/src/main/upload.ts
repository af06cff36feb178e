import busboy from "busboy";
import type http from "node:http";
import { PipelineError } from "../shared/errors";
import { getLogger, toErrorPayload } from "../shared/logger";

const logger = getLogger("upload", "server");

export type UploadedFile = {
  filename: string;
  mimeType: string;
  bytes: Buffer;
};

export type UploadOptions = {
  fieldName: string;
  /** Streams beyond this many bytes are cut off and rejected as TOO_LARGE. */
  maxBytes: number;
};

/**
 * Reads the single file field of a multipart/form-data request. The size
 * limit applies while the body streams in, so oversized uploads are never
 * held in memory whole.
 */
export const readUpload = (
  req: http.IncomingMessage,
  options: UploadOptions,
): Promise<UploadedFile> => {
  return new Promise<UploadedFile>((resolve, reject) => {
    let parser: busboy.Busboy;
    try {
      parser = busboy({
        headers: req.headers,
        limits: { fileSize: options.maxBytes, files: 1 },
      });
    } catch (error) {
      // Raised for a missing or non-multipart content type.
      req.resume();
      reject(
        new PipelineError("MISSING_FILE", "Request is not multipart/form-data", {
          cause: error,
        }),
      );
      return;
    }

    let upload: UploadedFile | null = null;
    let failure: PipelineError | null = null;

    parser.on("file", (fieldName, stream, info) => {
      if (fieldName !== options.fieldName || upload || failure) {
        stream.resume();
        return;
      }

      if (!info.filename) {
        failure = new PipelineError("MISSING_FILE", "Upload has no filename");
        stream.resume();
        return;
      }

      const chunks: Buffer[] = [];
      stream.on("data", (chunk: Buffer) => {
        chunks.push(chunk);
      });
      stream.on("limit", () => {
        failure = new PipelineError(
          "TOO_LARGE",
          `Upload exceeds ${options.maxBytes} bytes`,
        );
        chunks.length = 0;
      });
      // The parser waits for every file stream to end before it closes.
      stream.on("end", () => {
        if (stream.truncated || failure) {
          return;
        }
        upload = {
          filename: info.filename,
          mimeType: info.mimeType,
          bytes: Buffer.concat(chunks),
        };
      });
    });

    parser.on("close", () => {
      if (failure) {
        reject(failure);
        return;
      }
      if (!upload) {
        reject(
          new PipelineError(
            "MISSING_FILE",
            `No "${options.fieldName}" file in upload`,
          ),
        );
        return;
      }
      resolve(upload);
    });

    parser.on("error", (error: unknown) => {
      logger.warn("Malformed multipart body", { error: toErrorPayload(error) });
      req.unpipe(parser);
      req.resume();
      reject(
        new PipelineError("INVALID_INPUT", "Malformed multipart body", {
          cause: error,
        }),
      );
    });

    req.on("error", (error) => {
      reject(
        new PipelineError("INTERNAL", "Upload stream failed", { cause: error }),
      );
    });

    req.pipe(parser);
  });
};
