import fsp from "node:fs/promises";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { GetObjectCommand, HeadObjectCommand, type S3Client } from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";

import { artifactObjectKey } from "@trackprint/shared";

export const DOWNLOAD_URL_TTL_SEC = 60 * 10;

export interface ArtifactLinks {
  /** a time-limited url for the user's embeddings document, or null when there is none */
  downloadUrl(userId: string): Promise<string | null>;
}

function isNotFound(err: unknown) {
  if (typeof err !== "object" || err === null) return false;
  const name = "name" in err ? err.name : undefined;
  const meta = "$metadata" in err ? err.$metadata : undefined;
  const status =
    typeof meta === "object" && meta !== null && "httpStatusCode" in meta ? meta.httpStatusCode : undefined;
  return name === "NotFound" || name === "NoSuchKey" || status === 404;
}

export class R2ArtifactLinks implements ArtifactLinks {
  constructor(
    private readonly s3: S3Client,
    private readonly bucket: string
  ) {}

  async downloadUrl(userId: string): Promise<string | null> {
    const key = artifactObjectKey(userId);

    // sign only what exists
    try {
      await this.s3.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }

    return getSignedUrl(this.s3, new GetObjectCommand({ Bucket: this.bucket, Key: key }), {
      expiresIn: DOWNLOAD_URL_TTL_SEC,
    });
  }
}

/** documents written by a worker without object storage */
export class LocalArtifactLinks implements ArtifactLinks {
  constructor(private readonly rootDir: string) {}

  async downloadUrl(userId: string): Promise<string | null> {
    const file = path.join(this.rootDir, artifactObjectKey(userId));
    try {
      await fsp.access(file);
    } catch {
      return null;
    }
    return pathToFileURL(file).href;
  }
}
