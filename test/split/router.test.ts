import {expect} from 'chai'
import {existsSync, readdirSync, readFileSync, symlinkSync} from 'node:fs'
import {join} from 'node:path'

import {ColumnNotFoundError, GroupKeyCollisionError, UnsafeGroupKeyError} from '../../src/errors.js'
import {
  computeGroupKey,
  isSafeGroupKey,
  outputPathFor,
  resolveColumnIndex,
  RowRouter,
  UNKNOWN_GROUP,
} from '../../src/split/router.js'
import {captureError, captureSyncError, makeConfig, makeTempDir, removeDir} from '../helpers.js'

describe('resolveColumnIndex', () => {
  it('returns the zero-based index of the column', () => {
    expect(resolveColumnIndex(['id', 'City', 'State'], 'State')).to.equal(2)
  })

  it('matches case-sensitively', () => {
    const error = captureSyncError(() => resolveColumnIndex(['id', 'State'], 'state'))
    expect(error).to.be.instanceOf(ColumnNotFoundError).and.include({
      column: 'state',
      message: 'column "state" not found in header (id, State)',
    })
  })
})

describe('computeGroupKey', () => {
  it('returns the column value', () => {
    expect(computeGroupKey(['1', 'CA'], 1)).to.equal('CA')
  })

  it('substitutes unknown for empty and blank values', () => {
    expect(computeGroupKey(['3', ''], 1)).to.equal(UNKNOWN_GROUP)
    expect(computeGroupKey(['3', '   '], 1)).to.equal('unknown')
  })

  it('keeps the raw value when it is not blank', () => {
    expect(computeGroupKey(['1', ' CA'], 1)).to.equal(' CA')
  })

  it('gives the same key for the same record', () => {
    const record = ['7', 'NY']
    expect(computeGroupKey(record, 1)).to.equal(computeGroupKey(record, 1))
  })

  it('rejects an index outside the record', () => {
    expect(captureSyncError(() => computeGroupKey(['1'], 1))).to.be.instanceOf(RangeError)
  })
})

describe('isSafeGroupKey', () => {
  it('accepts plain values', () => {
    expect(isSafeGroupKey('CA')).to.be.true
    expect(isSafeGroupKey('New York')).to.be.true
    expect(isSafeGroupKey('v1.2')).to.be.true
  })

  it('rejects separators and relative segments', () => {
    expect(isSafeGroupKey('a/b')).to.be.false
    expect(isSafeGroupKey('a\\b')).to.be.false
    expect(isSafeGroupKey('..')).to.be.false
    expect(isSafeGroupKey('.')).to.be.false
  })
})

describe('outputPathFor', () => {
  it('places files flat in the output directory', () => {
    expect(outputPathFor('/data/out', false, 'CA')).to.equal('/data/out/CA.csv')
  })

  it('places files in a directory per key', () => {
    expect(outputPathFor('/data/out', true, 'CA')).to.equal('/data/out/CA/CA.csv')
  })
})

describe('RowRouter', () => {
  let dir: string

  beforeEach(() => {
    dir = makeTempDir()
  })

  afterEach(() => {
    removeDir(dir)
  })

  it('fails on construction when the column is missing', () => {
    const config = makeConfig({groupColumn: 'Region', inputPath: join(dir, 'in.csv'), outputDir: dir})
    expect(captureSyncError(() => new RowRouter(['id', 'State'], config))).to.be.instanceOf(ColumnNotFoundError)
  })

  it('reuses one writer per key', async () => {
    const router = new RowRouter(['id', 'State'], makeConfig({inputPath: join(dir, 'in.csv'), outputDir: dir}))
    const first = await router.getOrCreateWriter('CA')
    const second = await router.getOrCreateWriter('CA')

    expect(second).to.equal(first)
    expect(router.openFiles).to.equal(1)
    await router.finalize()
  })

  it('writes the header once and every routed row', async () => {
    const router = new RowRouter(['id', 'State'], makeConfig({inputPath: join(dir, 'in.csv'), outputDir: dir}))

    expect(await router.route(['1', 'CA'])).to.equal('CA')
    expect(await router.route(['2', 'NY'])).to.equal('NY')
    expect(await router.route(['3', 'CA'])).to.equal('CA')
    const files = await router.finalize()

    expect(files).to.deep.equal([
      {key: 'CA', path: join(dir, 'CA.csv'), rows: 2},
      {key: 'NY', path: join(dir, 'NY.csv'), rows: 1},
    ])
    expect(readFileSync(join(dir, 'CA.csv'), 'utf8')).to.equal('id|State\n1|CA\n3|CA\n')
    expect(readFileSync(join(dir, 'NY.csv'), 'utf8')).to.equal('id|State\n2|NY\n')
  })

  it('creates the key directory in subdirectory mode', async () => {
    const config = makeConfig({inputPath: join(dir, 'in.csv'), outputDir: dir, splitIntoSubdirs: true})
    const router = new RowRouter(['id', 'State'], config)

    await router.route(['1', ''])
    await router.finalize()

    expect(readFileSync(join(dir, 'unknown', 'unknown.csv'), 'utf8')).to.equal('id|State\n1|\n')
  })

  it('leaves the group column out when asked to', async () => {
    const config = makeConfig({dropGroupColumn: true, inputPath: join(dir, 'in.csv'), outputDir: dir})
    const router = new RowRouter(['id', 'State', 'City'], config)

    await router.route(['1', 'CA', 'Fresno'])
    await router.finalize()

    expect(readFileSync(join(dir, 'CA.csv'), 'utf8')).to.equal('id|City\n1|Fresno\n')
  })

  it('refuses keys that are not a single path segment', async () => {
    const router = new RowRouter(['id', 'State'], makeConfig({inputPath: join(dir, 'in.csv'), outputDir: dir}))

    const error = await captureError(router.route(['1', '../escape']))
    await router.finalize()

    expect(error).to.be.instanceOf(UnsafeGroupKeyError).and.include({key: '../escape'})
    expect(readdirSync(dir)).to.deep.equal([])
    expect(existsSync(join(dir, '..', 'escape.csv'))).to.be.false
  })

  it('refuses a second key that resolves to an already open file', async () => {
    // Stands in for `ca.csv` and `CA.csv` naming one file on a case-insensitive filesystem.
    symlinkSync('CA.csv', join(dir, 'ca.csv'))
    const router = new RowRouter(['id', 'State'], makeConfig({inputPath: join(dir, 'in.csv'), outputDir: dir}))

    await router.route(['1', 'CA'])
    const error = await captureError(router.route(['2', 'ca']))
    await router.finalize()

    expect(error).to.be.instanceOf(GroupKeyCollisionError).and.include({
      exitCode: 5,
      existingKey: 'CA',
      key: 'ca',
      kind: 'unsafe-key',
      message: `group values "ca" and "CA" resolve to the same file: ${join(dir, 'ca.csv')}`,
    })
    expect(readFileSync(join(dir, 'CA.csv'), 'utf8')).to.equal('id|State\n1|CA\n')
  })
})
