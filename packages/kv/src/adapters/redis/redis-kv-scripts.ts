// KEYS[1] is the value key and KEYS[2] its version key throughout. An empty
// ttl argument keeps the value's current expiry; the version key always
// follows the value's expiry.
const WRITE_AND_BUMP = `
local function write(value, ttl)
  if ttl ~= '' then
    redis.call('SET', KEYS[1], value, 'PX', ttl)
  else
    redis.call('SET', KEYS[1], value, 'KEEPTTL')
  end

  local version = redis.call('INCR', KEYS[2])
  local pttl = redis.call('PTTL', KEYS[1])

  if pttl > 0 then
    redis.call('PEXPIRE', KEYS[2], pttl)
  else
    redis.call('PERSIST', KEYS[2])
  end

  return tostring(version)
end
`

/** ARGV: value, ttl. Returns the new version. */
export const SET_WITH_VERSION = `${WRITE_AND_BUMP}
return write(ARGV[1], ARGV[2])
`

/** Returns `{value, version}`, or nil for a missing key. */
export const GET_VERSIONED = `
local value = redis.call('GET', KEYS[1])
if not value then
  return nil
end

return { value, redis.call('GET', KEYS[2]) or '0' }
`

/** ARGV: expected version, value, ttl. Returns the new version, 'conflict' or 'not_found'. */
export const SET_IF_VERSION = `${WRITE_AND_BUMP}
if redis.call('EXISTS', KEYS[1]) == 0 then
  return 'not_found'
end

if (redis.call('GET', KEYS[2]) or '0') ~= ARGV[1] then
  return 'conflict'
end

return write(ARGV[2], ARGV[3])
`

/** ARGV: value, ttl. Returns 'written' or 'skipped'. */
export const SET_IF_NOT_EXISTS = `${WRITE_AND_BUMP}
if redis.call('EXISTS', KEYS[1]) == 1 then
  return 'skipped'
end

write(ARGV[1], ARGV[2])
return 'written'
`
