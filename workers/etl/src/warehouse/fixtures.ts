import { readFile } from 'node:fs/promises';
import { rawDatasetSchema, type RawDataset } from '@petalbrew/shared';

/** Parse a JSON raw snapshot; throws with the failing path on bad input. */
export function parseDataset(json: string, origin = 'dataset'): RawDataset {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    throw new Error(`${origin} is not valid JSON`, { cause: err });
  }

  const result = rawDatasetSchema.safeParse(data);
  if (!result.success) {
    const [issue] = result.error.issues;
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : result.error.message;
    throw new Error(`${origin} does not match the raw dataset shape (${where})`);
  }
  return result.data;
}

export async function loadDataset(path: string): Promise<RawDataset> {
  return parseDataset(await readFile(path, 'utf8'), path);
}
