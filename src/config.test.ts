import { describe, it, expect } from 'vitest'
import { ZodError } from 'zod'
import { loadConfig } from './config'

describe('loadConfig', () => {
  it('should apply defaults', () => {
    expect(loadConfig({}, {})).toEqual({
      missingRemoval: 'error',
      freezeSnapshots: true,
      debug: false
    })
  })

  it('should read environment variables', () => {
    const config = loadConfig(
      {},
      {
        SPANSTYLE_MISSING_REMOVAL: 'ignore',
        SPANSTYLE_FREEZE_SNAPSHOTS: 'false',
        SPANSTYLE_DEBUG: '1'
      }
    )
    expect(config).toEqual({ missingRemoval: 'ignore', freezeSnapshots: false, debug: true })
  })

  it('should prefer explicit options over the environment', () => {
    const config = loadConfig({ debug: false, missingRemoval: 'error' }, {
      SPANSTYLE_DEBUG: 'true',
      SPANSTYLE_MISSING_REMOVAL: 'ignore'
    })
    expect(config.debug).toBe(false)
    expect(config.missingRemoval).toBe('error')
  })

  it('should ignore empty environment variables', () => {
    expect(loadConfig({}, { SPANSTYLE_MISSING_REMOVAL: '', SPANSTYLE_DEBUG: '' })).toEqual({
      missingRemoval: 'error',
      freezeSnapshots: true,
      debug: false
    })
  })

  it('should reject unknown removal policies', () => {
    expect(() => loadConfig({}, { SPANSTYLE_MISSING_REMOVAL: 'explode' })).toThrow(ZodError)
  })
})
