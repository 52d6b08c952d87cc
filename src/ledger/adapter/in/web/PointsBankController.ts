import {zValidator} from '@hono/zod-validator';
import {Hono} from 'hono';
import type {Context} from 'hono';
import {container} from 'tsyringe';
import type {ZodError} from 'zod';
import {InsufficientBalanceException} from '../../../application/domain/exception/InsufficientBalanceException';
import {InvalidLedgerInputException} from '../../../application/domain/exception/InvalidLedgerInputException';
import {LedgerDataIntegrityException} from '../../../application/domain/exception/LedgerDataIntegrityException';
import {StoreUnavailableException} from '../../../application/domain/exception/StoreUnavailableException';
import {UnknownCatalogItemException} from '../../../application/domain/exception/UnknownCatalogItemException';
import type {GetPointsSummaryQuery} from '../../../application/port/in/GetPointsSummaryQuery';
import {GetPointsSummaryQueryToken} from '../../../application/port/in/GetPointsSummaryQuery';
import type {RecordPointsUseCase} from '../../../application/port/in/RecordPointsUseCase';
import {RecordPointsUseCaseToken} from '../../../application/port/in/RecordPointsUseCase';
import {
    toAdjustPointsCommand,
    toCreatedResponse,
    toErrorResponse,
    toLedgerEntryId,
    toLedgerEntryResponse,
    toQuickEarnCommand,
    toRedeemRewardCommand,
    toSuccessResponse,
    toSummaryResponse,
} from './mappers/PointsBankMapper';
import {
    AdjustPointsWebRequestSchema,
    EntryIdParamSchema,
    QuickEarnWebRequestSchema,
    RedeemRewardWebRequestSchema,
} from './models/PointsBankWebRequest';
import {parentPinGuard} from './ParentPinGuard';

export const pointsBankRouter = new Hono();

/**
 * リクエストの形式エラーも同じ封筒で返す
 */
function rejectInvalid(
    result: { success: true } | { success: false; error: ZodError },
    c: Context
): Response | undefined {
    if (!result.success) {
        return c.json(
            toErrorResponse('Invalid request', 'INVALID_INPUT', {
                issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
            }),
            400
        );
    }
    return undefined;
}

/**
 * ユースケースから投げられた例外を HTTP レスポンスに変換
 */
function toErrorResult(c: Context, error: unknown): Response {
    // ===== 入力・ビジネスルールのエラー =====

    // 入力不正（空の activity、0 ポイント、存在しない日付など）
    if (error instanceof InvalidLedgerInputException) {
        return c.json(
            toErrorResponse(error.message, 'INVALID_INPUT', {field: error.field}),
            400
        );
    }

    // 残高不足
    if (error instanceof InsufficientBalanceException) {
        return c.json(
            toErrorResponse('Reward redemption failed - insufficient balance', 'INSUFFICIENT_BALANCE', {
                reward: error.rewardName,
                cost: error.cost.getValue(),
                currentBalance: error.currentBalance.getValue(),
            }),
            400
        );
    }

    // カタログにない項目
    if (error instanceof UnknownCatalogItemException) {
        return c.json(
            toErrorResponse(
                error.message,
                error.catalog === 'reward' ? 'UNKNOWN_REWARD' : 'UNKNOWN_QUICK_EARN',
                {name: error.itemName}
            ),
            404
        );
    }

    // ===== ストアのエラー =====

    if (error instanceof StoreUnavailableException) {
        console.error('❌ Ledger store unavailable:', error);
        return c.json(
            toErrorResponse('Ledger store is unavailable, please try again', 'STORE_UNAVAILABLE', {
                operation: error.operation,
            }),
            503
        );
    }

    if (error instanceof LedgerDataIntegrityException) {
        console.error('❌ Malformed ledger data:', error);
        return c.json(
            toErrorResponse(error.message, 'LEDGER_DATA_INTEGRITY', {issues: error.issues}),
            500
        );
    }

    // ===== その他のエラー =====

    // 予期しないエラー（バグ等）
    console.error('Unexpected error:', error);

    const errorMessage = error instanceof Error ? error.message : 'Unknown error occurred';

    return c.json(toErrorResponse(errorMessage, 'INTERNAL_ERROR'), 500);
}

/**
 * GET /api/summary
 * 残高・累計・今日の増減、ご褒美の交換可否、クイック獲得の一覧
 */
pointsBankRouter.get('/summary', async (c): Promise<Response> => {
    try {
        const query = container.resolve<GetPointsSummaryQuery>(GetPointsSummaryQueryToken);
        const summary = await query.getSummary();

        return c.json(toSuccessResponse('Summary loaded', toSummaryResponse(summary)), 200);
    } catch (error) {
        return toErrorResult(c, error);
    }
});

/**
 * GET /api/entries
 * 履歴（新しい日付順、同じ日付なら新しい id 順）
 */
pointsBankRouter.get('/entries', async (c): Promise<Response> => {
    try {
        const query = container.resolve<GetPointsSummaryQuery>(GetPointsSummaryQueryToken);
        const entries = await query.getHistory();

        return c.json(toSuccessResponse('History loaded', entries.map(toLedgerEntryResponse)), 200);
    } catch (error) {
        return toErrorResult(c, error);
    }
});

/**
 * POST /api/quick-earn
 * カタログのラベルを指定してポイントを獲得
 */
pointsBankRouter.post(
    '/quick-earn',
    zValidator('json', QuickEarnWebRequestSchema, rejectInvalid),
    async (c): Promise<Response> => {
        try {
            // 1. バリデーション済みのボディをコマンドに変換
            const command = toQuickEarnCommand(c.req.valid('json'));

            // 2. ユースケースを実行
            const useCase = container.resolve<RecordPointsUseCase>(RecordPointsUseCaseToken);
            const id = await useCase.quickEarn(command);

            return c.json(toCreatedResponse('Points recorded', id), 201);
        } catch (error) {
            return toErrorResult(c, error);
        }
    }
);

/**
 * POST /api/rewards/redeem
 * ご褒美を交換（残高が足りない場合は拒否）
 */
pointsBankRouter.post(
    '/rewards/redeem',
    zValidator('json', RedeemRewardWebRequestSchema, rejectInvalid),
    async (c): Promise<Response> => {
        try {
            const command = toRedeemRewardCommand(c.req.valid('json'));

            const useCase = container.resolve<RecordPointsUseCase>(RecordPointsUseCaseToken);
            const id = await useCase.redeemReward(command);

            return c.json(toCreatedResponse('Reward redeemed', id), 201);
        } catch (error) {
            return toErrorResult(c, error);
        }
    }
);

/**
 * POST /api/adjustments（保護者のみ）
 * 任意の加減算。負の値でも残高チェックはしない
 */
pointsBankRouter.post(
    '/adjustments',
    parentPinGuard,
    zValidator('json', AdjustPointsWebRequestSchema, rejectInvalid),
    async (c): Promise<Response> => {
        try {
            const command = toAdjustPointsCommand(c.req.valid('json'));

            const useCase = container.resolve<RecordPointsUseCase>(RecordPointsUseCaseToken);
            const id = await useCase.adjustPoints(command);

            return c.json(toCreatedResponse('Adjustment recorded', id), 201);
        } catch (error) {
            return toErrorResult(c, error);
        }
    }
);

/**
 * DELETE /api/entries/:id（保護者のみ）
 * 存在しない id でも 204 を返す
 */
pointsBankRouter.delete(
    '/entries/:id',
    parentPinGuard,
    zValidator('param', EntryIdParamSchema, rejectInvalid),
    async (c): Promise<Response> => {
        try {
            const id = toLedgerEntryId(c.req.valid('param').id);

            const useCase = container.resolve<RecordPointsUseCase>(RecordPointsUseCaseToken);
            await useCase.deleteEntry(id);

            return c.body(null, 204);
        } catch (error) {
            return toErrorResult(c, error);
        }
    }
);
