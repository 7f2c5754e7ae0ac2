import { join } from 'path';
import { ContentLoaderService } from './content-loader.service.js';
import { makeContentBundle } from './testing/make-content.js';

const CONTENT_DIR = join(__dirname, '..', '..', 'content', 'checkpoint_v1');

describe('ContentLoaderService', () => {
  it('reads and indexes the shipped content', async () => {
    const loader = new ContentLoaderService();
    const bundle = await loader.readBundle(CONTENT_DIR);
    loader.load(bundle);

    expect(bundle.categories).toHaveLength(5);
    expect(bundle.shipTypes).toHaveLength(8);
    expect(bundle.storyShips).toHaveLength(5);
    expect(loader.getShipType('BULK_CRUISER')?.categoryId).toBe('MERCHANT_FREIGHTER');
    expect(loader.getDefaults().shipTypeId).toBe('BULK_CRUISER');
  });

  it('fails when the content files are missing', async () => {
    const loader = new ContentLoaderService();
    await expect(loader.readBundle(join(CONTENT_DIR, 'missing'))).rejects.toThrow();
  });

  it('rejects dangling references', () => {
    const loader = new ContentLoaderService();
    const bundle = makeContentBundle({
      shipTypes: [
        { shipTypeId: 'HAULER', name: 'Hauler', categoryId: 'FREIGHT', description: '' },
        { shipTypeId: 'GHOST', name: 'Ghost', categoryId: 'NOWHERE', description: '' },
      ],
    });

    expect(() => loader.load(bundle)).toThrow(
      'Content references are broken: shipType GHOST → category NOWHERE',
    );
  });

  it('rejects a default ship type outside the default category', () => {
    const loader = new ContentLoaderService();
    const base = makeContentBundle();
    const bundle = makeContentBundle({
      defaults: { ...base.defaults, shipTypeId: 'CUTTER' },
    });

    expect(() => loader.load(bundle)).toThrow(
      'defaults → shipType CUTTER is not in category FREIGHT',
    );
  });

  it('finds access codes regardless of case', () => {
    const loader = new ContentLoaderService();
    loader.load(makeContentBundle());
    expect(loader.findAccessCode('mg-1000')?.code).toBe('MG-1000');
    expect(loader.findAccessCode('ZZ-1')).toBeUndefined();
  });

  it('getDefaults throws before load', () => {
    expect(() => new ContentLoaderService().getDefaults()).toThrow('Content has not been loaded');
  });
});
