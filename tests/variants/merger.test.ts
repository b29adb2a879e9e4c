import { MergePreconditionError, VariantErrorCode } from '../../src/variants/errors.js';
import { classifySeed, mergeVariants, mergeVariantsWithReport } from '../../src/variants/merger.js';
import type { CardEntry, ModelRecord, Seed } from '../../src/variants/types.js';

const model = (safeTensorFileName: string, modelId = '', diffusionBaseModel = ''): ModelRecord => ({
  modelId,
  diffusionBaseModel,
  modelVersionName: '',
  safeTensorFileName,
});

const seed = (m: ModelRecord, folder = 'root'): Seed => ({
  model: m,
  sourcePath: '/loras',
  folderPath: `/loras/${folder}`,
  treePath: folder,
  treeSegments: [folder],
});

function counter() {
  let n = 0;
  return () => `id-${++n}`;
}

const labels = (entry: CardEntry) => entry.variants.map(v => v.label);

describe('mergeVariants', () => {
  beforeEach(() => {
    jest.restoreAllMocks();
  });

  it('merges a High/Low pair with the same id and base model into one card', () => {
    const high = model('wan_character_high.safetensors', '123', 'WanVideo');
    const low = model('wan_character_low.safetensors', '123', 'WanVideo');

    const entries = mergeVariants([seed(high), seed(low)]);

    expect(entries).toHaveLength(1);
    expect(labels(entries[0])).toEqual(['High', 'Low']);
    expect(entries[0].model).toBe(high);
    expect(entries[0].variants[1].model).toBe(low);
    expect(entries[0].normalizedKey).toBe('wancharacter');
  });

  it('orders High first even when Low is seen first, keeping the first seed paths', () => {
    const low = seed(model('wan_character_low.safetensors', '123', 'WanVideo'), 'low-folder');
    const high = seed(model('wan_character_high.safetensors', '123', 'WanVideo'), 'high-folder');

    const [entry] = mergeVariants([low, high]);

    expect(labels(entry)).toEqual(['High', 'Low']);
    expect(entry.model).toBe(high.model);
    expect(entry.sourcePath).toBe('/loras');
    expect(entry.folderPath).toBe('/loras/low-folder');
    expect(entry.treePath).toBe('low-folder');
    expect(entry.treeSegments).toEqual(['low-folder']);
  });

  it('keeps identical filenames apart when one has no model id', () => {
    const withId = model('wan_character_high.safetensors', '123', 'WanVideo');
    const withoutId = model('wan_character_high.safetensors', '', 'WanVideo');

    const entries = mergeVariants([seed(withId), seed(withoutId)]);

    expect(entries).toHaveLength(2);
    expect(entries[0].model).toBe(withId);
    expect(entries[1].model).toBe(withoutId);
    expect(labels(entries[0])).toEqual(['High']);
    expect(labels(entries[1])).toEqual(['High']);
  });

  it('renders a blank model as a standalone card with a generated key', () => {
    const blank = model('');

    const entries = mergeVariants([seed(blank)], { generateId: counter() });

    expect(entries).toHaveLength(1);
    expect(entries[0].model).toBe(blank);
    expect(entries[0].variants).toEqual([]);
    expect(entries[0].normalizedKey).toBe('id-1');
  });

  it('never collides two blank models', () => {
    const entries = mergeVariants([seed(model('')), seed(model(''))], { generateId: counter() });

    expect(entries.map(e => e.normalizedKey)).toEqual(['id-1', 'id-2']);
  });

  it('places each group where its first seed appeared', () => {
    const orbitHigh = seed(model('orbit_high.safetensors', '1', 'WanVideo'), 'a');
    const meadow = seed(model('Quiet Meadow.safetensors', '2', 'SDXL'), 'x');
    const lanternHigh = seed(model('lantern_high.safetensors', '3', 'WanVideo'), 'y');
    const orbitLow = seed(model('orbit_low.safetensors', '1', 'WanVideo'), 'b');
    const lanternLow = seed(model('lantern_low.safetensors', '3', 'WanVideo'), 'z');

    const entries = mergeVariants([orbitHigh, meadow, lanternHigh, orbitLow, lanternLow]);

    expect(entries).toHaveLength(3);
    expect(entries[0].treePath).toBe('a');
    expect(entries[0].normalizedKey).toBe('orbit');
    expect(labels(entries[0])).toEqual(['High', 'Low']);
    expect(entries[1].model).toBe(meadow.model);
    expect(entries[1].variants).toEqual([]);
    expect(entries[2].treePath).toBe('y');
    expect(entries[2].normalizedKey).toBe('lantern');
    expect(labels(entries[2])).toEqual(['High', 'Low']);
  });

  it('preserves input order for standalone entries under any permutation', () => {
    const seeds = ['orbit_v2', 'lantern_e10', 'meadow_14b', 'Quiet Meadow'].map(n => seed(model(`${n}.safetensors`)));
    const reversed = [...seeds].reverse();

    expect(mergeVariants(seeds).map(e => e.model)).toEqual(seeds.map(s => s.model));
    expect(mergeVariants(reversed).map(e => e.model)).toEqual(reversed.map(s => s.model));
  });

  it('represents every seed in exactly one entry', () => {
    const seeds = [
      seed(model('orbit_high.safetensors', '1', 'WanVideo')),
      seed(model('Quiet Meadow.safetensors')),
      seed(model('orbit_low.safetensors', '1', 'WanVideo')),
      seed(model('lantern_low.safetensors', '3', 'WanVideo')),
      seed(model('')),
    ];

    const entries = mergeVariants(seeds);
    const represented = entries.flatMap(e => (e.variants.length > 0 ? e.variants.map(v => v.model) : [e.model]));

    expect(entries.length).toBeGreaterThanOrEqual(1);
    expect(entries.length).toBeLessThanOrEqual(seeds.length);
    expect(represented).toHaveLength(seeds.length);
    for (const s of seeds) {
      expect(represented.filter(m => m === s.model)).toHaveLength(1);
    }
  });

  it('does not merge when the base model differs', () => {
    const entries = mergeVariants([
      seed(model('orbit_high.safetensors', '1', 'WanVideo')),
      seed(model('orbit_low.safetensors', '1', 'SDXL')),
    ]);
    expect(entries).toHaveLength(2);
  });

  it('does not merge when the model id differs', () => {
    const entries = mergeVariants([
      seed(model('orbit_high.safetensors', '1', 'WanVideo')),
      seed(model('orbit_low.safetensors', '2', 'WanVideo')),
    ]);
    expect(entries).toHaveLength(2);
  });

  it('does not merge when the base model is missing', () => {
    const entries = mergeVariants([
      seed(model('orbit_high.safetensors', '1', '')),
      seed(model('orbit_low.safetensors', '1', '')),
    ]);
    expect(entries).toHaveLength(2);
  });

  it('does not merge a model without a variant marker', () => {
    const entries = mergeVariants([
      seed(model('orbit.safetensors', '1', 'WanVideo')),
      seed(model('orbit_low.safetensors', '1', 'WanVideo')),
    ]);

    expect(entries).toHaveLength(2);
    expect(entries[0].variants).toEqual([]);
    expect(labels(entries[1])).toEqual(['Low']);
  });

  it('compares the group key case-insensitively', () => {
    const entries = mergeVariants([
      seed(model('orbit_high.safetensors', 'abc', 'wanvideo')),
      seed(model('ORBIT_LOW.safetensors', 'ABC', 'WanVideo')),
    ]);

    expect(entries).toHaveLength(1);
    expect(labels(entries[0])).toEqual(['High', 'Low']);
  });

  it('lets the last seed win when two share a label', () => {
    const first = model('orbit_high.safetensors', '1', 'WanVideo');
    const second = model('orbit_high_e20.safetensors', '1', 'WanVideo');

    const { entries, report } = mergeVariantsWithReport([seed(first), seed(second)]);

    expect(entries).toHaveLength(1);
    expect(labels(entries[0])).toEqual(['High']);
    expect(entries[0].model).toBe(second);
    expect(report.overwrittenVariants).toBe(1);
  });

  it('keeps marker-only files standalone when their key comes from the sanitized fallback', () => {
    const first = model('HighNoise.safetensors', '7', 'Wan');
    const second = model('HighNoise.safetensors', '7', 'Wan');

    const { entries, report } = mergeVariantsWithReport([seed(first), seed(second)]);

    expect(entries).toHaveLength(2);
    expect(entries[0].model).toBe(first);
    expect(entries[1].model).toBe(second);
    expect(entries[0].normalizedKey).toBe('highnoisesafetensors');
    expect(labels(entries[0])).toEqual(['High']);
    expect(labels(entries[1])).toEqual(['High']);
    expect(report.groups).toBe(0);
    expect(report.standalone).toBe(2);
    expect(report.overwrittenVariants).toBe(0);
  });

  it('keeps models with generated keys standalone even with an id and base model', () => {
    const entries = mergeVariants(
      [seed(model('', '7', 'Wan')), seed(model('', '7', 'Wan'))],
      { generateId: counter() }
    );
    expect(entries.map(e => e.normalizedKey)).toEqual(['id-1', 'id-2']);
  });

  it('returns an empty list for no seeds', () => {
    expect(mergeVariants([])).toEqual([]);
  });

  it('accepts any iterable', () => {
    function* seeds() {
      yield seed(model('orbit_high.safetensors', '1', 'WanVideo'));
      yield seed(model('orbit_low.safetensors', '1', 'WanVideo'));
    }
    expect(mergeVariants(seeds())).toHaveLength(1);
  });

  it('rejects a missing seed sequence', () => {
    expect(() => mergeVariants(null as unknown as Seed[])).toThrow(MergePreconditionError);

    let caught: unknown;
    try {
      mergeVariants(undefined as unknown as Seed[]);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(MergePreconditionError);
    expect(caught).toMatchObject({ code: VariantErrorCode.MISSING_SEEDS, message: 'seeds must be provided' });
  });

  it('logs group creation and overwrites in debug mode', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => {});
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});

    mergeVariants(
      [
        seed(model('orbit_high.safetensors', '1', 'WanVideo')),
        seed(model('orbit_high_e20.safetensors', '1', 'WanVideo')),
      ],
      { debug: true }
    );

    expect(log).toHaveBeenCalledWith('[mergeVariants] GROUP', { handle: 0, normalizedKey: 'orbit', modelId: '1' });
    expect(warn).toHaveBeenCalledWith('[mergeVariants] OVERWRITE', {
      handle: 0,
      label: 'High',
      previous: 'orbit_high.safetensors',
      next: 'orbit_high_e20.safetensors',
    });
  });

  it('stays quiet without debug mode', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => {});
    mergeVariants([seed(model('orbit_high.safetensors', '1', 'WanVideo'))], { debug: false });
    expect(log).not.toHaveBeenCalled();
  });
});

describe('mergeVariantsWithReport', () => {
  it('counts seeds, cards and groups', () => {
    const { report } = mergeVariantsWithReport(
      [
        seed(model('orbit_high.safetensors', '1', 'WanVideo')),
        seed(model('Quiet Meadow.safetensors', '2', 'SDXL')),
        seed(model('lantern_high.safetensors', '3', 'WanVideo')),
        seed(model('orbit_low.safetensors', '1', 'WanVideo')),
        seed(model('')),
      ],
      { generateId: counter() }
    );

    expect(report).toEqual({
      seeds: 5,
      cards: 4,
      groups: 2,
      groupedSeeds: 3,
      standalone: 2,
      overwrittenVariants: 0,
      generatedKeys: 1,
    });
  });
});

describe('classifySeed', () => {
  it('combines the classifier label with a guaranteed key', () => {
    expect(classifySeed(seed(model('')), counter())).toEqual({
      classification: { normalizedKey: 'id-1', variantLabel: '' },
      keySource: 'generated',
    });
    expect(classifySeed(seed(model('orbit_low.safetensors')), counter())).toEqual({
      classification: { normalizedKey: 'orbit', variantLabel: 'Low' },
      keySource: 'model',
    });
  });

  it('is stable across calls', () => {
    const s = seed(model('lantern_high.safetensors', '3', 'WanVideo'));
    expect(classifySeed(s)).toEqual(classifySeed(s));
  });
});
