import { resolve } from "path";

import { loadReadmeMetadataFile } from "../../metadata/loader.js";
import { formatError, formatSuccess } from "../formatters.js";

/**
 * `validate <file>`: check a metadata JSON file against the schema
 *
 * @returns Process exit code
 */
export async function runValidate(file: string): Promise<number> {
  const result = await loadReadmeMetadataFile(resolve(file));

  if (!result.success) {
    console.error(formatError(result.error));
    return 1;
  }

  console.log(formatSuccess(`${file} is valid (${result.data.repo.distribution_name})`));
  return 0;
}
