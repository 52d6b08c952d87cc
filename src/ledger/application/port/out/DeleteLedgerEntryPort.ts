import type {LedgerEntryId} from '../../domain/model/LedgerEntry';

/**
 * 台帳のエントリを削除するための出力ポート
 */
export interface DeleteLedgerEntryPort {
    /**
     * 指定IDの行を物理削除する
     *
     * 存在しないIDの場合は何もしない（冪等）。画面の一覧が古くても安全に呼べる。
     *
     * @throws StoreUnavailableException 永続化先に到達できない場合
     */
    deleteById(id: LedgerEntryId): Promise<void>;
}

/**
 * DI用のシンボル
 */
export const DeleteLedgerEntryPortToken = Symbol('DeleteLedgerEntryPort');
