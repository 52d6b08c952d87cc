import {createMiddleware} from 'hono/factory';
import {container} from 'tsyringe';
import {PointsBankPropertiesToken} from '../../../application/domain/service/PointsBankProperties';
import type {PointsBankProperties} from '../../../application/domain/service/PointsBankProperties';
import {toErrorResponse} from './mappers/PointsBankMapper';

export const PARENT_PIN_HEADER = 'x-parent-pin';

/**
 * 保護者向け操作（任意の加減算・削除）のゲート
 *
 * x-parent-pin ヘッダーと PARENT_PIN を平文で比較するだけ。画面上の誤操作防止用で、認証ではない。
 * PARENT_PIN が未設定なら素通しする。
 */
export const parentPinGuard = createMiddleware(async (c, next) => {
    const {parentPin} = container.resolve<PointsBankProperties>(PointsBankPropertiesToken);

    if (parentPin !== undefined && c.req.header(PARENT_PIN_HEADER) !== parentPin) {
        return c.json(
            toErrorResponse('Parent PIN required for this action', 'PARENT_PIN_REQUIRED'),
            401
        );
    }

    await next();
});
