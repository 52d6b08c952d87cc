import type {LedgerEntry, LedgerEntryId} from '../../domain/model/LedgerEntry';

// 依存関係の向き(永続化層がアプリケーション層に依存する)
// 永続化層（adapter/out/persistence）
//     ↓ 依存(実装)
// アプリケーション層のポート（application/port/out）(ここ)
//     ↑ 依存
// アプリケーション層のサービス（application/service）

/**
 * 台帳にエントリを追記するための出力ポート
 */
export interface AppendLedgerEntryPort {
    /**
     * 新しい行を1件保存し、採番したIDを返す
     *
     * - IDはこれまでに採番したどのIDよりも大きい（削除後も再利用しない）
     * - 内容の意味的な検証はしない（0 ポイントや残高超過の消費もそのまま保存する）
     *
     * @param entry IDを持たないエントリ
     * @throws StoreUnavailableException 永続化先に到達できない場合
     */
    append(entry: LedgerEntry): Promise<LedgerEntryId>;
}

/**
 * DI用のシンボル
 */
export const AppendLedgerEntryPortToken = Symbol('AppendLedgerEntryPort');
