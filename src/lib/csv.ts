/**
 * CSV Reader
 * 讀取含表頭的 CSV（逗號分隔、雙引號包覆欄位、"" 跳脫）
 */

export interface CsvTable {
  headers: string[];
  rows: Array<Record<string, string>>;
}

/**
 * 將 CSV 文字拆成欄位陣列
 */
export function parseCsvRecords(text: string): string[][] {
  // 去除 UTF-8 BOM（Excel 匯出常見）
  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;

  for (let i = 0; i < input.length; i++) {
    const char = input[i];

    if (inQuotes) {
      if (char === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    switch (char) {
      case '"':
        inQuotes = true;
        break;
      case ',':
        record.push(field);
        field = '';
        break;
      case '\r':
        break;
      case '\n':
        record.push(field);
        records.push(record);
        record = [];
        field = '';
        break;
      default:
        field += char;
    }
  }

  if (field.length > 0 || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  // 忽略完全空白的行
  return records.filter((r) => !(r.length === 1 && r[0].trim() === ''));
}

/**
 * 解析含表頭的 CSV
 */
export function parseCsv(text: string): CsvTable {
  const [headerRecord, ...dataRecords] = parseCsvRecords(text);
  if (!headerRecord) {
    return { headers: [], rows: [] };
  }

  const headers = headerRecord.map((h) => h.trim());
  const rows = dataRecords.map((values) => {
    const row: Record<string, string> = {};
    headers.forEach((header, index) => {
      row[header] = values[index] ?? '';
    });
    return row;
  });

  return { headers, rows };
}
