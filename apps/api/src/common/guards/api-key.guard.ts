import { Injectable, CanActivate, ExecutionContext, UnauthorizedException, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';
import { timingSafeEqual } from 'crypto';

export const API_KEY_HEADER = 'x-api-key';

function sameKey(received: string, expected: string): boolean {
    const a = Buffer.from(received, 'utf8');
    const b = Buffer.from(expected, 'utf8');
    return a.length === b.length && timingSafeEqual(a, b);
}

@Injectable()
export class ApiKeyGuard implements CanActivate {
    private readonly logger = new Logger(ApiKeyGuard.name);

    constructor(private readonly configService: ConfigService) { }

    canActivate(context: ExecutionContext): boolean {
        const expectedApiKey = this.configService.get<string>('auth.rootApiKey');
        if (!expectedApiKey) {
            this.logger.error('API_ROOT_API_KEY (auth.rootApiKey) is not configured.');
            throw new UnauthorizedException('API Key configuration error');
        }

        const header = context.switchToHttp().getRequest<Request>().headers[API_KEY_HEADER];
        const receivedApiKey = Array.isArray(header) ? header[0] : header;

        if (!receivedApiKey || !sameKey(receivedApiKey, expectedApiKey)) {
            throw new UnauthorizedException('Invalid or missing API key');
        }

        return true;
    }
}
