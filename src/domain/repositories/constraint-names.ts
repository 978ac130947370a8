/**
 * Unique constraint names shared by both backends. They match the index and
 * constraint names in db/schema.sql, so a `UniquenessRaceError.constraint`
 * reads the same whichever store raised it.
 */
export const USERS_EMAIL_KEY = 'users_email_key';
export const PROFILES_PKEY = 'profiles_pkey';
export const PROFILES_USERNAME_KEY = 'profiles_username_lower_key';
export const BALANCES_PKEY = 'user_balances_pkey';
export const PARTICIPANTS_ROOM_USER_KEY = 'audio_room_participants_room_id_user_id_key';
