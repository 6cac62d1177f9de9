import { S3Client } from "@aws-sdk/client-s3";

import { type R2Env, r2Endpoint } from "./env";

export function createR2Client(env: R2Env): S3Client {
  return new S3Client({
    region: "auto",
    endpoint: r2Endpoint(env.R2_ACCOUNT_ID),
    credentials: {
      accessKeyId: env.R2_ACCESS_KEY_ID,
      secretAccessKey: env.R2_SECRET_ACCESS_KEY,
    },
    forcePathStyle: true,
    requestChecksumCalculation: "WHEN_REQUIRED",
    responseChecksumValidation: "WHEN_REQUIRED",
  });
}
