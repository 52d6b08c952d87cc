import type {Points} from '../model/Points';

/**
 * 残高不足例外
 *
 * ご褒美のコストが現在の残高を上回る場合に投げる。
 * 台帳の不変条件ではなく交換時の方針なので、ストアは残高超過の消費でも保存してしまう。
 * 別の呼び出し経路を作る場合は、そちらでも同じ検証が必要。
 */
export class InsufficientBalanceException extends Error {
    constructor(
        public readonly rewardName: string,
        public readonly cost: Points,
        public readonly currentBalance: Points
    ) {
        super(
            `Insufficient balance for "${rewardName}": ` +
            `costs ${cost.toString()}, but current balance is ${currentBalance.toString()}`
        );
        this.name = 'InsufficientBalanceException';
    }
}
