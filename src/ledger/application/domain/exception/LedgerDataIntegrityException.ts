/**
 * ストアから読み出した行が台帳エントリの形をしていない場合の例外
 *
 * 小数のポイントや日付の欠落など。集計（computeTotals）に渡る前にマッパーで検出する。
 */
export class LedgerDataIntegrityException extends Error {
    constructor(
        public readonly issues: readonly string[],
        public readonly rowId?: unknown
    ) {
        super(
            `Malformed ledger row${rowId === undefined ? '' : ` (id=${String(rowId)})`}: ${issues.join(', ')}`
        );
        this.name = 'LedgerDataIntegrityException';
    }
}
