import {InvalidLedgerInputException} from '../../../../application/domain/exception/InvalidLedgerInputException';
import {CalendarDate} from '../../../../application/domain/model/CalendarDate';
import {LedgerEntryId} from '../../../../application/domain/model/LedgerEntry';
import type {LedgerEntry} from '../../../../application/domain/model/LedgerEntry';
import {AdjustPointsCommand} from '../../../../application/port/in/AdjustPointsCommand';
import type {PointsSummary} from '../../../../application/port/in/GetPointsSummaryQuery';
import {QuickEarnCommand} from '../../../../application/port/in/QuickEarnCommand';
import {RedeemRewardCommand} from '../../../../application/port/in/RedeemRewardCommand';
import type {
    AdjustPointsWebRequest,
    QuickEarnWebRequest,
    RedeemRewardWebRequest,
} from '../models/PointsBankWebRequest';
import type {
    CreatedEntryWebResponse,
    LedgerEntryWebResponse,
    PointsBankWebResponse,
    SummaryWebResponse,
} from '../models/PointsBankWebResponse';

/**
 * Web層とアプリケーション層の間でモデルを変換するマッパー
 *
 * 責務：
 * - Webリクエストをドメインコマンドに変換
 * - ユースケースの結果をWebレスポンスに変換
 */

export function toQuickEarnCommand(request: QuickEarnWebRequest): QuickEarnCommand {
    return new QuickEarnCommand(request.label);
}

export function toRedeemRewardCommand(request: RedeemRewardWebRequest): RedeemRewardCommand {
    return new RedeemRewardCommand(request.name);
}

/**
 * 日付文字列は形式だけ検証済みなので、実在する日付かどうかはここで確認する
 */
export function toAdjustPointsCommand(request: AdjustPointsWebRequest): AdjustPointsCommand {
    let entryDate: CalendarDate | null = null;
    if (request.entryDate !== undefined) {
        if (!CalendarDate.isValid(request.entryDate)) {
            throw new InvalidLedgerInputException('entryDate', `"${request.entryDate}" is not a calendar date`);
        }
        entryDate = CalendarDate.parse(request.entryDate);
    }

    return new AdjustPointsCommand(request.activity, request.points, entryDate, request.notes ?? '');
}

export function toLedgerEntryId(id: string): LedgerEntryId {
    const value = Number(id);
    if (!Number.isSafeInteger(value) || value <= 0) {
        throw new InvalidLedgerInputException('id', `"${id}" is not a ledger entry id`);
    }
    return new LedgerEntryId(value);
}

export function toLedgerEntryResponse(entry: LedgerEntry): LedgerEntryWebResponse {
    return {
        id: entry.getId()?.getValue() ?? null,
        entryDate: entry.getEntryDate().toString(),
        person: entry.getPerson(),
        activity: entry.getActivity(),
        points: entry.getPoints().getValue(),
        notes: entry.getNotes(),
        type: entry.isSpend() ? 'spend' : 'earn',
    };
}

export function toSummaryResponse(summary: PointsSummary): SummaryWebResponse {
    const {totals, worth, rewards, affordability, quickActions} = summary;
    const next = affordability.nextReward;

    return {
        balance: totals.balance.getValue(),
        lifetime: totals.lifetime.getValue(),
        spent: totals.spent.getValue(),
        today: totals.today.getValue(),
        worth: {
            balance: worth.balance,
            lifetime: worth.lifetime,
        },
        rewards: rewards.map((reward) => ({
            name: reward.name,
            cost: reward.cost.getValue(),
            notes: reward.notes,
            affordable: affordability.affordable.includes(reward),
        })),
        nextReward: next
            ? {
                name: next.reward.name,
                cost: next.reward.cost.getValue(),
                pointsNeeded: next.pointsNeeded.getValue(),
                progress: next.progress,
            }
            : null,
        quickEarn: quickActions.map((action) => ({
            label: action.label,
            points: action.points.getValue(),
        })),
    };
}

/**
 * 成功レスポンスを作成
 */
export function toSuccessResponse<T>(message: string, data: T): PointsBankWebResponse<T> {
    return {
        success: true,
        message,
        data,
    };
}

/**
 * 追記成功（201）のレスポンスを作成
 */
export function toCreatedResponse(
    message: string,
    id: LedgerEntryId
): PointsBankWebResponse<CreatedEntryWebResponse> {
    return toSuccessResponse(message, {id: id.getValue()});
}

/**
 * エラーレスポンスを作成
 */
export function toErrorResponse(
    message: string,
    code: string,
    details?: Record<string, unknown>
): PointsBankWebResponse<never> {
    return {
        success: false,
        message,
        error: {
            code,
            details,
        },
    };
}
