import fsp from "node:fs/promises";
import path from "node:path";
import { PutObjectCommand, type S3Client } from "@aws-sdk/client-s3";

import { artifactObjectKey, type Logger } from "@trackprint/shared";

import type { ArtifactStore, EmbeddingsArtifact } from "../types/processing";

function serialize(artifact: EmbeddingsArtifact) {
  return JSON.stringify(artifact);
}

/** one object per user, overwritten by each completed job */
export class R2ArtifactStore implements ArtifactStore {
  constructor(
    private readonly s3: S3Client,
    private readonly bucket: string,
    private readonly log?: Logger
  ) {}

  async save(artifact: EmbeddingsArtifact): Promise<string> {
    const key = artifactObjectKey(artifact.user_id);
    const body = serialize(artifact);

    await this.s3.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: "application/json",
      })
    );

    this.log?.info({ bucket: this.bucket, key, entries: artifact.entries.length, bytes: body.length }, "artifact uploaded");
    return `s3://${this.bucket}/${key}`;
  }
}

/** same layout under a local directory, for runs without object storage */
export class LocalArtifactStore implements ArtifactStore {
  constructor(
    private readonly rootDir: string,
    private readonly log?: Logger
  ) {}

  async save(artifact: EmbeddingsArtifact): Promise<string> {
    const file = path.join(this.rootDir, artifactObjectKey(artifact.user_id));
    await fsp.mkdir(path.dirname(file), { recursive: true });

    const tmp = `${file}.tmp`;
    await fsp.writeFile(tmp, serialize(artifact));
    await fsp.rename(tmp, file);

    this.log?.info({ file, entries: artifact.entries.length }, "artifact written");
    return file;
  }
}
