/**
 * カタログに存在しないご褒美・クイックアクションを指定された場合の例外
 */
export class UnknownCatalogItemException extends Error {
    constructor(
        public readonly catalog: 'reward' | 'quickEarn',
        public readonly itemName: string
    ) {
        super(`Unknown ${catalog === 'reward' ? 'reward' : 'quick earn action'}: "${itemName}"`);
        this.name = 'UnknownCatalogItemException';
    }
}
