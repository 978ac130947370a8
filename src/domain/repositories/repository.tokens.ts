/**
 * NestJS injection tokens for repository interfaces.
 *
 * Usage:
 *   @Inject(ACCOUNT_STORE) private readonly store: IAccountStore
 */
export const ACCOUNT_STORE = 'ACCOUNT_STORE';
export const AUDIO_ROOM_REPOSITORY = 'AUDIO_ROOM_REPOSITORY';
