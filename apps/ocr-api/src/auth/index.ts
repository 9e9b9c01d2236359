// ── Module ──────────────────────────────────────────────────
export { AuthModule } from './auth.module';

// ── Guards (for use in other feature modules) ───────────────
export { JwtAuthGuard } from './guards/jwt-auth.guard';

// ── Decorators (for use in other feature modules) ───────────
export { CurrentUser } from './decorators/current-user.decorator';

// ── Interfaces (for typing in other feature modules) ────────
export type { JwtPayload, RequestUser, AuthenticatedRequest } from './interfaces';
