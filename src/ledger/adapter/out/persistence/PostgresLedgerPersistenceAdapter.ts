import {inject, injectable} from 'tsyringe';
import {PostgresPoolToken} from '../../../../config/types';
import {StoreUnavailableException} from '../../../application/domain/exception/StoreUnavailableException';
import {LedgerEntryId} from '../../../application/domain/model/LedgerEntry';
import type {LedgerEntry} from '../../../application/domain/model/LedgerEntry';
import type {AppendLedgerEntryPort} from '../../../application/port/out/AppendLedgerEntryPort';
import type {DeleteLedgerEntryPort} from '../../../application/port/out/DeleteLedgerEntryPort';
import type {InitializeLedgerStorePort} from '../../../application/port/out/InitializeLedgerStorePort';
import type {LoadLedgerEntriesPort} from '../../../application/port/out/LoadLedgerEntriesPort';
import {InsertedLedgerEntryIdSchema, POINTS_LOG_TABLE} from './entities/LedgerEntryRecord';
import {toDomainList, toRecord} from './mappers/LedgerEntryMapper';

/**
 * プールから借りる接続（pg の PoolClient のうち、このアダプターが使う部分）
 */
export interface PostgresQueryClient {
    query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;

    /**
     * 接続をプールに返す。エラーを渡すと接続は破棄される
     */
    release(err?: Error | boolean): void;
}

/**
 * 接続プール（pg の Pool のうち、このアダプターが使う部分）
 */
export interface PostgresConnectionPool {
    connect(): Promise<PostgresQueryClient>;
}

const CREATE_TABLE_SQL = `
    CREATE TABLE IF NOT EXISTS ${POINTS_LOG_TABLE} (
        id SERIAL PRIMARY KEY,
        entry_date DATE NOT NULL,
        person TEXT NOT NULL,
        activity TEXT NOT NULL,
        points INTEGER NOT NULL,
        notes TEXT DEFAULT ''
    )`;

const INSERT_SQL = `
    INSERT INTO ${POINTS_LOG_TABLE} (entry_date, person, activity, points, notes)
    VALUES ($1, $2, $3, $4, $5)
    RETURNING id`;

// DATE を to_char で文字列にする（pg は DATE をローカル時刻の Date に変換してしまう）
const SELECT_ALL_SQL = `
    SELECT id, to_char(entry_date, 'YYYY-MM-DD') AS entry_date, person, activity, points, notes
    FROM ${POINTS_LOG_TABLE}
    ORDER BY ${POINTS_LOG_TABLE}.entry_date DESC, ${POINTS_LOG_TABLE}.id DESC`;

const DELETE_SQL = `DELETE FROM ${POINTS_LOG_TABLE} WHERE id = $1`;

/**
 * Postgres を使用した台帳永続化アダプター
 *
 * - 接続プールはプロセスの生存期間中保持する（容量は設定で固定）
 * - 各操作はプールから接続を1つ借り、成功・失敗にかかわらず finally で返す
 * - 各操作は1文なので、成功するか何も起きないかのどちらか
 * - DBのエラーはすべて StoreUnavailableException にして呼び出し側へ伝える（再試行しない）
 */
@injectable()
export class PostgresLedgerPersistenceAdapter
    implements AppendLedgerEntryPort, LoadLedgerEntriesPort, DeleteLedgerEntryPort, InitializeLedgerStorePort {

    constructor(
        @inject(PostgresPoolToken) private readonly pool: PostgresConnectionPool
    ) {
        console.log('✅ PostgresLedgerPersistenceAdapter initialized');
    }

    /**
     * points_log テーブルがなければ作成
     */
    async ensureSchema(): Promise<void> {
        await this.withClient('ensureSchema', (client) => client.query(CREATE_TABLE_SQL));
        console.log(`💾 Table "${POINTS_LOG_TABLE}" is ready`);
    }

    async append(entry: LedgerEntry): Promise<LedgerEntryId> {
        const record = toRecord(entry);

        const {rows} = await this.withClient('append', (client) =>
            client.query(INSERT_SQL, [
                record.entry_date,
                record.person,
                record.activity,
                record.points,
                record.notes,
            ])
        );

        const inserted = InsertedLedgerEntryIdSchema.safeParse(rows[0]);
        if (!inserted.success) {
            throw new StoreUnavailableException('append', new Error('INSERT did not return an id'));
        }

        console.log(`✅ Inserted ledger entry ${String(inserted.data.id)} (${record.points.toString()} pts)`);
        return new LedgerEntryId(inserted.data.id);
    }

    async list(): Promise<LedgerEntry[]> {
        const {rows} = await this.withClient('list', (client) => client.query(SELECT_ALL_SQL));
        return toDomainList(rows);
    }

    async deleteById(id: LedgerEntryId): Promise<void> {
        await this.withClient('deleteById', (client) => client.query(DELETE_SQL, [id.getValue()]));
        console.log(`🗑️  Deleted ledger entry ${id.toString()} (if it existed)`);
    }

    /**
     * 接続を1つ借りて処理を実行し、必ず返却する
     *
     * 失敗した接続は release(error) で破棄させ、壊れた接続をプールに戻さない。
     */
    private async withClient<T>(
        operation: string,
        work: (client: PostgresQueryClient) => Promise<T>
    ): Promise<T> {
        let client: PostgresQueryClient;
        try {
            client = await this.pool.connect();
        } catch (error) {
            throw new StoreUnavailableException(operation, error);
        }

        let failure: Error | undefined;
        try {
            return await work(client);
        } catch (error) {
            failure = error instanceof Error ? error : new Error(String(error));
            throw new StoreUnavailableException(operation, error);
        } finally {
            client.release(failure);
        }
    }
}
