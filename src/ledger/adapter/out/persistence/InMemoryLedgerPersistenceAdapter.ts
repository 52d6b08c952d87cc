import {injectable} from 'tsyringe';
import {compareLedgerOrder, LedgerEntryId} from '../../../application/domain/model/LedgerEntry';
import type {LedgerEntry} from '../../../application/domain/model/LedgerEntry';
import type {AppendLedgerEntryPort} from '../../../application/port/out/AppendLedgerEntryPort';
import type {DeleteLedgerEntryPort} from '../../../application/port/out/DeleteLedgerEntryPort';
import type {InitializeLedgerStorePort} from '../../../application/port/out/InitializeLedgerStorePort';
import type {LoadLedgerEntriesPort} from '../../../application/port/out/LoadLedgerEntriesPort';
import type {PersistedLedgerEntryRecord} from './entities/LedgerEntryRecord';
import {toDomain, toRecord} from './mappers/LedgerEntryMapper';

/**
 * インメモリ台帳永続化アダプター
 * 開発・テスト用の簡易実装。プロセスが終了するとデータは消える
 *
 * IDは単調増加のカウンターで採番し、削除しても巻き戻さない。
 */
@injectable()
export class InMemoryLedgerPersistenceAdapter
    implements AppendLedgerEntryPort, LoadLedgerEntriesPort, DeleteLedgerEntryPort, InitializeLedgerStorePort {

    private rows: PersistedLedgerEntryRecord[] = [];
    private nextId = 1;

    async ensureSchema(): Promise<void> {
        // メモリ上の配列は常に存在する
    }

    async append(entry: LedgerEntry): Promise<LedgerEntryId> {
        const id = this.nextId++;
        this.rows.push({id, ...toRecord(entry)});
        return new LedgerEntryId(id);
    }

    async list(): Promise<LedgerEntry[]> {
        return this.rows.map((row) => toDomain(row)).sort(compareLedgerOrder);
    }

    async deleteById(id: LedgerEntryId): Promise<void> {
        this.rows = this.rows.filter((row) => row.id !== id.getValue());
    }
}
