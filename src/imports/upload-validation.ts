import { BadRequestException } from '@nestjs/common';

export const SPREADSHEET_EXTENSIONS = ['.xls', '.xlsx'] as const;

/** The parts of a multer file the import pipeline reads. */
export interface UploadedSpreadsheet {
  originalname: string;
  buffer: Buffer;
  size: number;
}

export function hasSpreadsheetExtension(fileName: string): boolean {
  const lower = fileName.trim().toLowerCase();
  return SPREADSHEET_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

export function assertSpreadsheetUpload(file: UploadedSpreadsheet, field: string): void {
  if (!hasSpreadsheetExtension(file.originalname)) {
    throw new BadRequestException(
      `${field} "${file.originalname}" must be an Excel file (${SPREADSHEET_EXTENSIONS.join(', ')})`,
    );
  }
  if (file.size === 0 || file.buffer.length === 0) {
    throw new BadRequestException(`${field} "${file.originalname}" is empty`);
  }
}
