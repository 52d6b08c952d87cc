import type {Points} from './Points';

/**
 * ご褒美（交換できる景品）
 */
export interface Reward {
    readonly name: string;
    readonly cost: Points;
    readonly notes: string;
}

/**
 * ワンタップで記録できる獲得アクション
 */
export interface QuickAction {
    readonly label: string;
    readonly points: Points;
}

/**
 * 次に狙うご褒美と、そこまでの進捗
 */
export interface NextReward {
    readonly reward: Reward;
    /** あと何ポイント必要か（常に正） */
    readonly pointsNeeded: Points;
    /** balance / cost を [0, 1] に収めた値 */
    readonly progress: number;
}

export interface RewardAffordability {
    readonly affordable: readonly Reward[];
    readonly locked: readonly Reward[];
    readonly nextReward: NextReward | null;
}

/**
 * ご褒美カタログ
 *
 * 宣言順を保持する。残高に対して「交換できる / まだ届かない」を判定する純粋なクエリのみを持つ。
 */
export class RewardCatalog {
    private readonly rewards: readonly Reward[];

    constructor(rewards: readonly Reward[]) {
        const names = new Set<string>();
        for (const reward of rewards) {
            if (!reward.cost.isPositive()) {
                throw new RangeError(`Reward "${reward.name}" must cost at least 1 point`);
            }
            if (names.has(reward.name)) {
                throw new RangeError(`Duplicate reward name: "${reward.name}"`);
            }
            names.add(reward.name);
        }
        this.rewards = [...rewards];
    }

    getRewards(): readonly Reward[] {
        return this.rewards;
    }

    findByName(name: string): Reward | undefined {
        return this.rewards.find((r) => r.name === name);
    }

    /**
     * 残高でカタログを分割する
     *
     * - affordable: cost <= balance
     * - locked: cost > balance
     * - nextReward: locked のうち最小コストのもの。同コストならカタログで先に宣言された方
     */
    checkAffordability(balance: Points): RewardAffordability {
        const affordable = this.rewards.filter((r) => balance.isGreaterThanOrEqualTo(r.cost));
        const locked = this.rewards.filter((r) => r.cost.isGreaterThan(balance));

        // 厳密に小さい場合のみ置き換えるので、同コストでは先勝ちになる
        const cheapestLocked = locked.reduce<Reward | null>(
            (cheapest, reward) =>
                cheapest === null || cheapest.cost.isGreaterThan(reward.cost) ? reward : cheapest,
            null
        );

        return {
            affordable,
            locked,
            nextReward: cheapestLocked === null ? null : toNextReward(cheapestLocked, balance),
        };
    }
}

function toNextReward(reward: Reward, balance: Points): NextReward {
    const ratio = balance.getValue() / reward.cost.getValue();
    return {
        reward,
        pointsNeeded: reward.cost.minus(balance),
        progress: Math.min(1, Math.max(0, ratio)),
    };
}

/**
 * ポイントを金額（ポンド）に換算して表示用文字列にする
 *
 * 単純な掛け算のみで、通貨の丸め規則は持たない。
 *
 * @example formatWorth(Points.of(25), 0.1) // => "£2.50"
 */
export function formatWorth(points: Points, poundsPerPoint: number): string {
    const worth = points.getValue() * poundsPerPoint;
    const sign = worth < 0 ? '-' : '';
    return `${sign}£${Math.abs(worth).toFixed(2)}`;
}
