import { registerAs } from '@nestjs/config';

export interface WarehouseSettings {
  csvPath: string;
  csvEncoding: BufferEncoding;
  databasePath: string;
  exportDir: string;
  runOnBoot: boolean;
}

const ENCODINGS: BufferEncoding[] = ['utf8', 'utf-8', 'latin1', 'ascii', 'utf16le'];

function parseEncoding(value: string | undefined): BufferEncoding {
  return ENCODINGS.find((e) => e === value?.toLowerCase()) ?? 'latin1';
}

export default registerAs(
  'warehouse',
  (): WarehouseSettings => ({
    csvPath: process.env.CSV_PATH || './data/online_retail_II.csv',
    // Online Retail exports are ISO-8859-1
    csvEncoding: parseEncoding(process.env.CSV_ENCODING),
    databasePath: process.env.WAREHOUSE_PATH || './online_retail.db',
    // Empty string switches CSV exports off
    exportDir: process.env.EXPORT_DIR ?? './exports',
    runOnBoot: (process.env.RUN_ON_BOOT ?? 'true').toLowerCase() !== 'false',
  }),
);
