/**
 * 台帳ストアの初期化を行う出力ポート
 */
export interface InitializeLedgerStorePort {
    /**
     * 保存先の構造（テーブル）がなければ作成する
     *
     * 冪等なので、プロセス起動のたびに呼んでよい。
     *
     * @throws StoreUnavailableException 接続またはスキーマ作成に失敗した場合
     */
    ensureSchema(): Promise<void>;
}

/**
 * DI用のシンボル
 */
export const InitializeLedgerStorePortToken = Symbol('InitializeLedgerStorePort');
