import {inject, injectable} from 'tsyringe';
import {InsufficientBalanceException} from '../domain/exception/InsufficientBalanceException';
import {UnknownCatalogItemException} from '../domain/exception/UnknownCatalogItemException';
import {Ledger} from '../domain/model/Ledger';
import {LedgerEntry} from '../domain/model/LedgerEntry';
import type {LedgerEntryId} from '../domain/model/LedgerEntry';
import {PointsBankPropertiesToken} from '../domain/service/PointsBankProperties';
import type {PointsBankProperties} from '../domain/service/PointsBankProperties';
import type {AdjustPointsCommand} from '../port/in/AdjustPointsCommand';
import type {QuickEarnCommand} from '../port/in/QuickEarnCommand';
import type {RecordPointsUseCase} from '../port/in/RecordPointsUseCase';
import type {RedeemRewardCommand} from '../port/in/RedeemRewardCommand';
import {AppendLedgerEntryPortToken} from '../port/out/AppendLedgerEntryPort';
import type {AppendLedgerEntryPort} from '../port/out/AppendLedgerEntryPort';
import {ClockToken} from '../port/out/Clock';
import type {Clock} from '../port/out/Clock';
import {DeleteLedgerEntryPortToken} from '../port/out/DeleteLedgerEntryPort';
import type {DeleteLedgerEntryPort} from '../port/out/DeleteLedgerEntryPort';
import {LoadLedgerEntriesPortToken} from '../port/out/LoadLedgerEntriesPort';
import type {LoadLedgerEntriesPort} from '../port/out/LoadLedgerEntriesPort';

/** ご褒美交換エントリの activity の接頭辞 */
export const SPEND_ACTIVITY_PREFIX = 'SPEND: ';

/**
 * 台帳書き込みアプリケーションサービス
 *
 * 役割: ユースケースの調整
 * - 受信ポート（RecordPointsUseCase）を実装
 * - カタログ参照と入力の方針（残高超過の交換を拒否する等）をここで適用
 * - 実際の保存は送信ポートに任せる
 *
 * 1回の操作で書き込むのは1行だけなので、トランザクション境界はストアの1文と一致する。
 */
@injectable()
export class PointsLedgerApplicationService implements RecordPointsUseCase {
    constructor(
        @inject(AppendLedgerEntryPortToken)
        private readonly appendLedgerEntryPort: AppendLedgerEntryPort,
        @inject(LoadLedgerEntriesPortToken)
        private readonly loadLedgerEntriesPort: LoadLedgerEntriesPort,
        @inject(DeleteLedgerEntryPortToken)
        private readonly deleteLedgerEntryPort: DeleteLedgerEntryPort,
        @inject(ClockToken)
        private readonly clock: Clock,
        @inject(PointsBankPropertiesToken)
        private readonly properties: PointsBankProperties
    ) {}

    async quickEarn(command: QuickEarnCommand): Promise<LedgerEntryId> {
        const action = this.properties.findQuickAction(command.label);
        if (!action) {
            throw new UnknownCatalogItemException('quickEarn', command.label);
        }

        return this.appendLedgerEntryPort.append(
            LedgerEntry.withoutId(
                this.clock.today(),
                this.properties.defaultPerson,
                action.label,
                action.points
            )
        );
    }

    async redeemReward(command: RedeemRewardCommand): Promise<LedgerEntryId> {
        const reward = this.properties.rewards.findByName(command.rewardName);
        if (!reward) {
            throw new UnknownCatalogItemException('reward', command.rewardName);
        }

        // ① 最新のスナップショットから残高を計算
        const today = this.clock.today();
        const ledger = new Ledger(...(await this.loadLedgerEntriesPort.list()));
        const {balance} = ledger.calculateTotals(today);

        // ② 残高超過の交換は拒否（ストアはこの検証をしない）
        if (reward.cost.isGreaterThan(balance)) {
            throw new InsufficientBalanceException(reward.name, reward.cost, balance);
        }

        // ③ コストを負のエントリとして追記
        return this.appendLedgerEntryPort.append(
            LedgerEntry.withoutId(
                today,
                this.properties.defaultPerson,
                `${SPEND_ACTIVITY_PREFIX}${reward.name}`,
                reward.cost.negate(),
                reward.notes
            )
        );
    }

    async adjustPoints(command: AdjustPointsCommand): Promise<LedgerEntryId> {
        return this.appendLedgerEntryPort.append(
            LedgerEntry.withoutId(
                command.entryDate ?? this.clock.today(),
                this.properties.defaultPerson,
                command.activity,
                command.points,
                command.notes
            )
        );
    }

    async deleteEntry(id: LedgerEntryId): Promise<void> {
        await this.deleteLedgerEntryPort.deleteById(id);
    }
}
