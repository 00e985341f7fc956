import { ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiKeyGuard } from './api-key.guard';

function contextWithHeaders(headers: Record<string, string | string[]>): ExecutionContext {
    return {
        switchToHttp: () => ({
            getRequest: () => ({ headers }),
        }),
    } as unknown as ExecutionContext;
}

describe('ApiKeyGuard', () => {
    const guard = new ApiKeyGuard(new ConfigService({ auth: { rootApiKey: 'test-secret' } }));

    it('should let a request with the configured key through', () => {
        expect(guard.canActivate(contextWithHeaders({ 'x-api-key': 'test-secret' }))).toBe(true);
    });

    it('should reject a missing or wrong key', () => {
        expect(() => guard.canActivate(contextWithHeaders({}))).toThrow(UnauthorizedException);
        expect(() => guard.canActivate(contextWithHeaders({ 'x-api-key': 'test-secreT' }))).toThrow(UnauthorizedException);
        expect(() => guard.canActivate(contextWithHeaders({ 'x-api-key': 'short' }))).toThrow(UnauthorizedException);
    });

    it('should reject every request when no key is configured', () => {
        const unconfigured = new ApiKeyGuard(new ConfigService({}));

        expect(() => unconfigured.canActivate(contextWithHeaders({ 'x-api-key': 'test-secret' })))
            .toThrow('API Key configuration error');
    });
});
