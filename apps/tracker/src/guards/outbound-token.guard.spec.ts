import { UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { OUTBOUND_TOKEN_HEADER, OutboundTokenGuard } from './outbound-token.guard';

const contextWithHeaders = (headers: Record<string, string>) =>
  new ExecutionContextHost([{ headers }, {}]);

describe('OutboundTokenGuard', () => {
  it('lets every request through when no token is configured', () => {
    const guard = new OutboundTokenGuard(new ConfigService({}));
    expect(guard.canActivate(contextWithHeaders({}))).toBe(true);
  });

  it('accepts the configured token', () => {
    const guard = new OutboundTokenGuard(new ConfigService({ TRACKER_API_TOKEN: 'test-secret' }));
    expect(guard.canActivate(contextWithHeaders({ [OUTBOUND_TOKEN_HEADER]: 'test-secret' }))).toBe(
      true,
    );
  });

  it('rejects a missing or wrong token', () => {
    const guard = new OutboundTokenGuard(new ConfigService({ TRACKER_API_TOKEN: 'test-secret' }));
    expect(() => guard.canActivate(contextWithHeaders({}))).toThrow(UnauthorizedException);
    expect(() =>
      guard.canActivate(contextWithHeaders({ [OUTBOUND_TOKEN_HEADER]: 'other-secret' })),
    ).toThrow('Invalid outbound auth token');
  });
});
