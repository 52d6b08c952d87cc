import {inject, injectable} from 'tsyringe';
import {Ledger} from '../domain/model/Ledger';
import type {LedgerEntry} from '../domain/model/LedgerEntry';
import {formatWorth} from '../domain/model/RewardCatalog';
import {PointsBankPropertiesToken} from '../domain/service/PointsBankProperties';
import type {PointsBankProperties} from '../domain/service/PointsBankProperties';
import type {GetPointsSummaryQuery, PointsSummary} from '../port/in/GetPointsSummaryQuery';
import {ClockToken} from '../port/out/Clock';
import type {Clock} from '../port/out/Clock';
import {LoadLedgerEntriesPortToken} from '../port/out/LoadLedgerEntriesPort';
import type {LoadLedgerEntriesPort} from '../port/out/LoadLedgerEntriesPort';

/**
 * 集計・履歴の読み取りサービス
 *
 * 毎回ストアから全件を読み直して計算する。キャッシュは持たない。
 */
@injectable()
export class PointsSummaryQueryService implements GetPointsSummaryQuery {
    constructor(
        @inject(LoadLedgerEntriesPortToken)
        private readonly loadLedgerEntriesPort: LoadLedgerEntriesPort,
        @inject(ClockToken)
        private readonly clock: Clock,
        @inject(PointsBankPropertiesToken)
        private readonly properties: PointsBankProperties
    ) {}

    async getSummary(): Promise<PointsSummary> {
        const ledger = await this.loadLedger();
        const totals = ledger.calculateTotals(this.clock.today());
        const {poundsPerPoint, rewards, quickActions} = this.properties;

        return {
            totals,
            worth: {
                balance: formatWorth(totals.balance, poundsPerPoint),
                lifetime: formatWorth(totals.lifetime, poundsPerPoint),
            },
            rewards: rewards.getRewards(),
            affordability: rewards.checkAffordability(totals.balance),
            quickActions,
        };
    }

    async getHistory(): Promise<readonly LedgerEntry[]> {
        const ledger = await this.loadLedger();
        return ledger.getEntries();
    }

    private async loadLedger(): Promise<Ledger> {
        return new Ledger(...(await this.loadLedgerEntriesPort.list()));
    }
}
