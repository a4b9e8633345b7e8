import { listSheets } from '../../io/workbook';
import { logger } from '../logger';

export async function runSheets(file: string): Promise<string[]> {
  const names = await listSheets(file);
  logger.step(`Sheets in ${file}`);
  names.forEach((name, idx) => logger.info(`${idx + 1}. ${name}`));
  return names;
}
