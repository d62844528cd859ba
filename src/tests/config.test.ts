import path from 'path'
import { describe, it, expect } from 'vitest'
import { loadConfig, resolveEnvironment, resolveLogLevel } from '../lib/config'

const cwd = path.resolve('/srv/records')

describe('loadConfig', () => {
  it('uses defaults with an empty environment', () => {
    expect(loadConfig({}, cwd)).toEqual({
      config: {
        logLevel: 'warn',
        seedFile: path.join(cwd, 'data', 'students.json'),
        nameSearch: { threshold: 0.4, limit: 10 },
      },
      warnings: [],
    })
  })

  it('reads every setting', () => {
    const { config, warnings } = loadConfig(
      {
        NODE_ENV: 'development',
        LOG_LEVEL: 'INFO',
        STUDENTS_SEED_FILE: 'fixtures/roster.json',
        NAME_SEARCH_THRESHOLD: '0.25',
        NAME_SEARCH_LIMIT: '3',
      },
      cwd
    )
    expect(warnings).toEqual([])
    expect(config).toEqual({
      logLevel: 'info',
      seedFile: path.join(cwd, 'fixtures', 'roster.json'),
      nameSearch: { threshold: 0.25, limit: 3 },
    })
  })

  it('keeps absolute seed paths', () => {
    const absolute = path.resolve('/data/seed.json')
    expect(loadConfig({ STUDENTS_SEED_FILE: absolute }, cwd).config.seedFile).toBe(absolute)
  })

  it('falls back and warns on unusable values', () => {
    const { config, warnings } = loadConfig(
      {
        NODE_ENV: 'staging',
        LOG_LEVEL: 'verbose',
        NAME_SEARCH_THRESHOLD: '2',
        NAME_SEARCH_LIMIT: '-4',
      },
      cwd
    )
    expect(config.logLevel).toBe('warn')
    expect(config.nameSearch).toEqual({ threshold: 0.4, limit: 10 })
    expect(warnings).toEqual([
      'Unknown NODE_ENV "staging", using production',
      'Unknown LOG_LEVEL "verbose", using the production default',
      'NAME_SEARCH_THRESHOLD must be between 0 and 1, got "2"',
      'NAME_SEARCH_LIMIT must be a positive whole number, got "-4"',
    ])
  })
})

describe('log level resolution', () => {
  it('derives the level from NODE_ENV', () => {
    expect(resolveLogLevel({ NODE_ENV: 'test' })).toBe('error')
    expect(resolveLogLevel({ NODE_ENV: 'development' })).toBe('debug')
    expect(resolveLogLevel({ NODE_ENV: 'production' })).toBe('warn')
    expect(resolveLogLevel({ NODE_ENV: 'test', LOG_LEVEL: 'debug' })).toBe('debug')
  })

  it('normalises NODE_ENV', () => {
    expect(resolveEnvironment({ NODE_ENV: ' Test ' })).toBe('test')
    expect(resolveEnvironment({})).toBe('production')
  })
})
