import {inject, injectable} from 'tsyringe';
import {SupabaseClientToken} from '../../../../config/types';
import type {LedgerSupabaseClient} from '../../../../config/types';
import {StoreUnavailableException} from '../../../application/domain/exception/StoreUnavailableException';
import {LedgerEntryId} from '../../../application/domain/model/LedgerEntry';
import type {LedgerEntry} from '../../../application/domain/model/LedgerEntry';
import type {AppendLedgerEntryPort} from '../../../application/port/out/AppendLedgerEntryPort';
import type {DeleteLedgerEntryPort} from '../../../application/port/out/DeleteLedgerEntryPort';
import type {InitializeLedgerStorePort} from '../../../application/port/out/InitializeLedgerStorePort';
import type {LoadLedgerEntriesPort} from '../../../application/port/out/LoadLedgerEntriesPort';
import {InsertedLedgerEntryIdSchema, POINTS_LOG_TABLE} from './entities/LedgerEntryRecord';
import {toDomainList, toRecord} from './mappers/LedgerEntryMapper';

const SELECT_COLUMNS = 'id, entry_date, person, activity, points, notes';

/** list() で1回に要求する件数 */
export const LIST_PAGE_SIZE = 1000;

/**
 * Supabase（PostgREST）を使用した台帳永続化アダプター
 *
 * 永続化層の責務：
 * 1. DBからデータを取得し、Mapperでドメインモデルに変換
 * 2. ドメインモデルをMapperでレコードに変換し、DBに保存
 *
 * 注意: PostgREST は DDL を実行できない。points_log は supabase/migrations の
 * マイグレーションで作成し、ensureSchema() ではテーブルに到達できるかだけを確認する。
 */
@injectable()
export class SupabaseLedgerPersistenceAdapter
    implements AppendLedgerEntryPort, LoadLedgerEntriesPort, DeleteLedgerEntryPort, InitializeLedgerStorePort {

    constructor(
        @inject(SupabaseClientToken) private readonly supabase: LedgerSupabaseClient
    ) {
        console.log('✅ SupabaseLedgerPersistenceAdapter initialized');
    }

    /**
     * points_log に到達できるか確認（件数のみ取得、行は返さない）
     */
    async ensureSchema(): Promise<void> {
        const {error, count} = await this.run('ensureSchema', () =>
            this.supabase
                .from(POINTS_LOG_TABLE)
                .select('id', {count: 'exact', head: true})
        );

        if (error) {
            throw new StoreUnavailableException(
                'ensureSchema',
                new Error(
                    `${error.message} (apply supabase/migrations to create "${POINTS_LOG_TABLE}")`
                )
            );
        }

        console.log(`💾 Table "${POINTS_LOG_TABLE}" is reachable (${String(count ?? 0)} rows)`);
    }

    async append(entry: LedgerEntry): Promise<LedgerEntryId> {
        const record = toRecord(entry);

        const {data, error} = await this.run('append', () =>
            this.supabase
                .from(POINTS_LOG_TABLE)
                .insert(record)
                .select('id')
                .single()
        );

        if (error) {
            throw new StoreUnavailableException('append', new Error(error.message));
        }

        const inserted = InsertedLedgerEntryIdSchema.safeParse(data);
        if (!inserted.success) {
            throw new StoreUnavailableException('append', new Error('insert did not return an id'));
        }

        console.log(`✅ Inserted ledger entry ${String(inserted.data.id)} (${record.points.toString()} pts)`);
        return new LedgerEntryId(inserted.data.id);
    }

    /**
     * 全件を表示順で取得する
     *
     * PostgREST は1回の応答を max_rows（既定 1000）件で打ち切るので、range でページごとに読む。
     * サーバー側の上限がページサイズより小さくても取りこぼさないよう、
     * 実際に返ってきた件数だけ進め、空のページが返るまで続ける。
     */
    async list(): Promise<LedgerEntry[]> {
        const rows: unknown[] = [];

        for (;;) {
            const from = rows.length;
            const {data, error} = await this.run('list', () =>
                this.supabase
                    .from(POINTS_LOG_TABLE)
                    .select(SELECT_COLUMNS)
                    .order('entry_date', {ascending: false})
                    .order('id', {ascending: false})
                    .range(from, from + LIST_PAGE_SIZE - 1)
            );

            if (error) {
                throw new StoreUnavailableException('list', new Error(error.message));
            }

            const page: unknown[] = data ?? [];
            if (page.length === 0) {
                break;
            }
            rows.push(...page);
        }

        return toDomainList(rows);
    }

    /**
     * 行を削除（該当行がなくてもエラーにしない）
     */
    async deleteById(id: LedgerEntryId): Promise<void> {
        const {error} = await this.run('deleteById', () =>
            this.supabase
                .from(POINTS_LOG_TABLE)
                .delete()
                .eq('id', id.getValue())
        );

        if (error) {
            throw new StoreUnavailableException('deleteById', new Error(error.message));
        }

        console.log(`🗑️  Deleted ledger entry ${id.toString()} (if it existed)`);
    }

    /**
     * クエリを実行する
     *
     * supabase-js は通常エラーを戻り値で返すが、設定によっては例外を投げるので、
     * どちらの場合も StoreUnavailableException として扱えるようにする。
     */
    private async run<T>(operation: string, query: () => PromiseLike<T>): Promise<T> {
        try {
            return await query();
        } catch (error) {
            throw new StoreUnavailableException(operation, error);
        }
    }
}
