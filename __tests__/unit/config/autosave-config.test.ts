import path from 'path'
import { ZodError } from 'zod'
import { AUTOSAVE_CONFIGS, getAutoSaveConfig, readAutoSaveEnv } from '@/lib/config/autosave-config'

describe('getAutoSaveConfig', () => {
  let warnSpy: jest.SpyInstance

  beforeEach(() => {
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    warnSpy.mockRestore()
  })

  it('returns the preset with the local directory resolved', () => {
    const config = getAutoSaveConfig({}, { preset: 'development', env: {} })

    expect(config.intervalMs).toBe(30000)
    expect(config.saveOnFocusLoss).toBe(true)
    expect(config.saveOnMovement).toBe(true)
    expect(config.destinations).toEqual(['local-file'])
    expect(config.movementDebounceMs).toBe(1000)
    expect(config.workspaceDebounceMs).toBe(1000)
    expect(config.resultHistoryLimit).toBe(10)
    expect(config.server).toEqual({
      url: 'http://localhost:8888',
      timeoutMs: 10000,
      remoteDirectory: 'autosave',
    })
    expect(config.local.directory).toBe(path.resolve('autosave'))
  })

  it('picks the preset from NODE_ENV', () => {
    expect(getAutoSaveConfig({}, { env: { NODE_ENV: 'test' } }).intervalMs).toBe(0)
    expect(getAutoSaveConfig({}, { env: { NODE_ENV: 'production' } }).debug).toBe(false)
    expect(getAutoSaveConfig({}, { env: {} }).debug).toBe(true)
  })

  it('applies environment values over the preset', () => {
    const config = getAutoSaveConfig(
      {},
      {
        preset: 'production',
        env: {
          NOTEBOOK_AUTOSAVE_ENABLED: 'off',
          NOTEBOOK_AUTOSAVE_INTERVAL_MS: '5000',
          NOTEBOOK_AUTOSAVE_DESTINATIONS: 'local-file, remote-server',
          NOTEBOOK_SERVER_URL: 'http://notebooks.test:9999',
          NOTEBOOK_SERVER_TOKEN: 'test-secret',
        },
      }
    )

    expect(config.enabled).toBe(false)
    expect(config.intervalMs).toBe(5000)
    expect(config.destinations).toEqual(['local-file', 'remote-server'])
    expect(config.server.url).toBe('http://notebooks.test:9999')
    expect(config.server.token).toBe('test-secret')
    expect(config.server.timeoutMs).toBe(10000)
  })

  it('ignores invalid environment values with a warning', () => {
    const config = getAutoSaveConfig(
      {},
      { preset: 'production', env: { NOTEBOOK_AUTOSAVE_INTERVAL_MS: 'soon', NOTEBOOK_AUTOSAVE_DESTINATIONS: 'cloud' } }
    )

    expect(config.intervalMs).toBe(30000)
    expect(config.destinations).toEqual(['local-file'])
    expect(warnSpy).toHaveBeenCalledTimes(2)
  })

  it('lets explicit overrides win over the environment', () => {
    const config = getAutoSaveConfig(
      { intervalMs: 1000, local: { directory: '/tmp/notebooks' }, server: { remoteDirectory: 'drafts' } },
      { preset: 'production', env: { NOTEBOOK_AUTOSAVE_INTERVAL_MS: '5000' } }
    )

    expect(config.intervalMs).toBe(1000)
    expect(config.local.directory).toBe(path.resolve('/tmp/notebooks'))
    expect(config.local.timestamped).toBe(true)
    expect(config.server.remoteDirectory).toBe('drafts')
  })

  it('rejects a configuration without destinations', () => {
    expect(() => getAutoSaveConfig({ destinations: [] }, { preset: 'test', env: {} })).toThrow(ZodError)
  })

  it('does not mutate the presets', () => {
    getAutoSaveConfig({ destinations: ['remote-server'] }, { preset: 'test', env: {} })
    expect(AUTOSAVE_CONFIGS.test.destinations).toEqual(['local-file'])
  })
})

describe('readAutoSaveEnv', () => {
  it('returns only the variables that are set', () => {
    expect(readAutoSaveEnv({ NOTEBOOK_AUTOSAVE_ON_MOVEMENT: 'no', NOTEBOOK_AUTOSAVE_DIR: 'out' })).toEqual({
      saveOnMovement: false,
      local: { directory: 'out' },
      server: {},
    })
  })
})
