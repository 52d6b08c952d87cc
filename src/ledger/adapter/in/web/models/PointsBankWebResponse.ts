/**
 * Web層専用のレスポンスモデル
 *
 * すべてのエンドポイントが同じ封筒（success / message / data / error）で返す。
 */
export interface PointsBankWebResponse<T> {
    success: boolean;
    message: string;
    data?: T;
    error?: {
        code: string;
        details?: Record<string, unknown>;
    };
}

export interface LedgerEntryWebResponse {
    id: number | null;
    entryDate: string;
    person: string;
    activity: string;
    points: number;
    notes: string;
    type: 'earn' | 'spend';
}

export interface RewardWebResponse {
    name: string;
    cost: number;
    notes: string;
    affordable: boolean;
}

export interface SummaryWebResponse {
    balance: number;
    lifetime: number;
    spent: number;
    today: number;
    worth: {
        balance: string;
        lifetime: string;
    };
    rewards: RewardWebResponse[];
    nextReward: {
        name: string;
        cost: number;
        pointsNeeded: number;
        progress: number;
    } | null;
    quickEarn: {
        label: string;
        points: number;
    }[];
}

export interface CreatedEntryWebResponse {
    id: number;
}
