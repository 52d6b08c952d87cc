import type {QuickAction, RewardCatalog} from '../model/RewardCatalog';

/**
 * ポイント銀行の設定プロパティ
 *
 * 起動時に一度だけ組み立てて DI コンテナに値として登録する。
 * 実行中に書き換えられることはない。
 */
export class PointsBankProperties {
    public readonly quickActions: readonly QuickAction[];

    constructor(
        /** 記録者として使う既定の名前 */
        public readonly defaultPerson: string,
        /** 1ポイントあたりの金額（ポンド） */
        public readonly poundsPerPoint: number,
        public readonly rewards: RewardCatalog,
        quickActions: readonly QuickAction[],
        /** 保護者用 PIN。未設定なら保護者向け操作は誰でも実行できる */
        public readonly parentPin: string | undefined
    ) {
        this.quickActions = Object.freeze([...quickActions]);
        Object.freeze(this);
    }

    findQuickAction(label: string): QuickAction | undefined {
        return this.quickActions.find((a) => a.label === label);
    }
}

/**
 * DI用のシンボル
 */
export const PointsBankPropertiesToken = Symbol('PointsBankProperties');
