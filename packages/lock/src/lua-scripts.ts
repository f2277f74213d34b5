/**
 * Lua script for atomically acquiring a lock.
 *
 * Sets the holder key only if it doesn't exist, with an optional TTL.
 *
 * @param KEYS[1] - Holder key
 * @param ARGV[1] - Owner id to store
 * @param ARGV[2] - TTL in milliseconds, "0" for no expiry
 *
 * @returns 1 if the lock was acquired, 0 if the holder key already exists
 *
 * @public
 */
export const ACQUIRE_SCRIPT = `
local ttl = tonumber(ARGV[2])
local ok
if ttl > 0 then
    ok = redis.call("SET", KEYS[1], ARGV[1], "NX", "PX", ttl)
else
    ok = redis.call("SET", KEYS[1], ARGV[1], "NX")
end
if ok then
    return 1
else
    return 0
end
`.trim();

/**
 * Lua script for atomically releasing a lock and waking one waiter.
 *
 * Verifies ownership before deleting the holder key. On success the stale
 * signal list is dropped, a fresh token pushed and the list given a short
 * expiry so unconsumed signals don't pile up.
 *
 * @param KEYS[1] - Holder key
 * @param KEYS[2] - Signal key
 * @param ARGV[1] - Expected owner id
 * @param ARGV[2] - Signal expiry in milliseconds
 *
 * @returns 1 if the lock was released, 0 if the owner id doesn't match or the lock doesn't exist
 *
 * @public
 */
export const RELEASE_SCRIPT = `
if redis.call("GET", KEYS[1]) == ARGV[1] then
    redis.call("DEL", KEYS[2])
    redis.call("LPUSH", KEYS[2], 1)
    redis.call("PEXPIRE", KEYS[2], ARGV[2])
    redis.call("DEL", KEYS[1])
    return 1
else
    return 0
end
`.trim();

/**
 * Lua script for atomically extending a lock's TTL.
 *
 * Verifies ownership and that the key carries a TTL before updating it.
 *
 * @param KEYS[1] - Holder key
 * @param ARGV[1] - Expected owner id
 * @param ARGV[2] - New TTL in milliseconds
 *
 * @returns 0 if extended, 1 if the owner id doesn't match, 2 if the key has no TTL
 *
 * @public
 */
export const EXTEND_SCRIPT = `
if redis.call("GET", KEYS[1]) ~= ARGV[1] then
    return 1
elseif redis.call("PTTL", KEYS[1]) < 0 then
    return 2
else
    redis.call("PEXPIRE", KEYS[1], ARGV[2])
    return 0
end
`.trim();

/**
 * Lua script for forcibly deleting a lock regardless of owner.
 *
 * @param KEYS[1] - Holder key
 * @param KEYS[2] - Signal key
 * @param ARGV[1] - Signal expiry in milliseconds
 *
 * @returns number of holder keys deleted (0 or 1)
 *
 * @public
 */
export const RESET_SCRIPT = `
redis.call("DEL", KEYS[2])
redis.call("LPUSH", KEYS[2], 1)
redis.call("PEXPIRE", KEYS[2], ARGV[1])
return redis.call("DEL", KEYS[1])
`.trim();
