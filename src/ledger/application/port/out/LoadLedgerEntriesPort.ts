import type {LedgerEntry} from '../../domain/model/LedgerEntry';

/**
 * 台帳の全エントリを読み込むための出力ポート
 */
export interface LoadLedgerEntriesPort {
    /**
     * 現在の全行を entryDate 降順 → id 降順で返す
     *
     * ページングはしない（件数は数百〜数千程度）。空のストアは空配列。
     *
     * @throws StoreUnavailableException 永続化先に到達できない場合
     * @throws LedgerDataIntegrityException 行の形式が不正な場合
     */
    list(): Promise<LedgerEntry[]>;
}

/**
 * DI用のシンボル
 */
export const LoadLedgerEntriesPortToken = Symbol('LoadLedgerEntriesPort');
