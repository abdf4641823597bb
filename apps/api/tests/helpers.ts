export interface MultipartPayload {
  payload: Buffer;
  headers: Record<string, string>;
}

const BOUNDARY = '----dashsync-test-boundary';

/**
 * Hand-built multipart body for fastify.inject
 */
export function multipartPayload(
  fields: Record<string, string>,
  file?: { filename: string; content: string }
): MultipartPayload {
  const parts: string[] = [];

  for (const [name, value] of Object.entries(fields)) {
    parts.push(`--${BOUNDARY}\r\nContent-Disposition: form-data; name="${name}"\r\n\r\n${value}\r\n`);
  }

  if (file) {
    parts.push(
      `--${BOUNDARY}\r\nContent-Disposition: form-data; name="file"; filename="${file.filename}"\r\n` +
      `Content-Type: application/octet-stream\r\n\r\n${file.content}\r\n`
    );
  }

  parts.push(`--${BOUNDARY}--\r\n`);

  return {
    payload: Buffer.from(parts.join('')),
    headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` },
  };
}

export function basicAuth(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}
