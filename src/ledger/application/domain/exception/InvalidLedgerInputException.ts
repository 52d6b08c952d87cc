/**
 * 呼び出し側の入力検証エラー
 *
 * 空の activity、0 ポイントの調整、不正な日付など。
 * ストア自体はこれらを検証しないので、台帳に書き込む前にアプリケーション層で投げる。
 */
export class InvalidLedgerInputException extends Error {
    constructor(
        public readonly field: string,
        reason: string
    ) {
        super(`Invalid ${field}: ${reason}`);
        this.name = 'InvalidLedgerInputException';
    }
}
