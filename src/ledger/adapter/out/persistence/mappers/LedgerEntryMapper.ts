import {LedgerDataIntegrityException} from '../../../../application/domain/exception/LedgerDataIntegrityException';
import {CalendarDate} from '../../../../application/domain/model/CalendarDate';
import {LedgerEntry, LedgerEntryId} from '../../../../application/domain/model/LedgerEntry';
import {Points} from '../../../../application/domain/model/Points';
import {PersistedLedgerEntryRecordSchema} from '../entities/LedgerEntryRecord';
import type {LedgerEntryRecord} from '../entities/LedgerEntryRecord';

/**
 * 永続化レコードとドメインモデルの間の変換
 *
 * 読み込み時はスキーマで検証し、形の合わない行は LedgerDataIntegrityException にする。
 * 集計に不正な値が流れ込むことはない。
 */

/**
 * DBの行（unknown）を LedgerEntry に変換
 */
export function toDomain(row: unknown): LedgerEntry {
    const result = PersistedLedgerEntryRecordSchema.safeParse(row);
    if (!result.success) {
        const rowId = typeof row === 'object' && row !== null && 'id' in row ? row.id : undefined;
        throw new LedgerDataIntegrityException(
            result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
            rowId
        );
    }

    const record = result.data;
    if (!CalendarDate.isValid(record.entry_date)) {
        throw new LedgerDataIntegrityException(
            [`entry_date: "${record.entry_date}" is not a calendar date`],
            record.id
        );
    }

    return LedgerEntry.withId(
        new LedgerEntryId(record.id),
        CalendarDate.parse(record.entry_date),
        record.person,
        record.activity,
        Points.of(record.points),
        record.notes ?? ''
    );
}

/**
 * 複数行をまとめて変換
 */
export function toDomainList(rows: readonly unknown[]): LedgerEntry[] {
    return rows.map((row) => toDomain(row));
}

/**
 * LedgerEntry を挿入用レコードに変換
 */
export function toRecord(entry: LedgerEntry): LedgerEntryRecord {
    return {
        entry_date: entry.getEntryDate().toString(),
        person: entry.getPerson(),
        activity: entry.getActivity(),
        points: entry.getPoints().getValue(),
        notes: entry.getNotes(),
    };
}
