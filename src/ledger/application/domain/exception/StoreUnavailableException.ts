/**
 * ストア利用不可例外
 *
 * 永続化先（Postgres / Supabase）に到達できない、またはスキーマ初期化に失敗した場合に
 * アダプターが投げる。内部で再試行はしない。呼び出し側が要求を出し直す。
 *
 * 失敗した操作は何も書き込んでいない（単一文のため部分適用は起きない）。
 */
export class StoreUnavailableException extends Error {
    /**
     * @param operation 失敗した操作名（'append' / 'list' / 'deleteById' / 'ensureSchema'）
     * @param cause 下位層のエラー
     */
    constructor(
        public readonly operation: string,
        cause?: unknown
    ) {
        super(
            `Ledger store unavailable during ${operation}` +
            (cause instanceof Error ? `: ${cause.message}` : ''),
            {cause}
        );
        this.name = 'StoreUnavailableException';
    }
}
