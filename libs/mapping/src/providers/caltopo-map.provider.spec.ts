import { Logger } from '@nestjs/common';
import { CaltopoClient } from './caltopo.client';
import { CaltopoMapProvider, MapFeaturesError } from './caltopo-map.provider';

describe('CaltopoMapProvider', () => {
  let client: CaltopoClient;
  let provider: CaltopoMapProvider;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'debug').mockImplementation();
    client = new CaltopoClient({ credentialId: 'CRED1', key: 'dGVzdC1zZWNyZXQ=' });
    provider = new CaltopoMapProvider(client, 'ABC12');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('splits shapes into routes and markers into markers', async () => {
    const getSpy = jest.spyOn(client, 'get').mockResolvedValue({
      result: {
        state: {
          features: [
            {
              id: 'shape-1',
              geometry: { type: 'LineString', coordinates: [[-77, 39, 120], [-77.001, 39.001]] },
              properties: { class: 'Shape', title: 'Course' },
            },
            {
              id: 'shape-2',
              geometry: {
                type: 'MultiLineString',
                coordinates: [[[-78, 40]], [[-78.1, 40.1], ['bad', 40.2]]],
              },
              properties: { class: 'Shape', title: 'Detour' },
            },
            {
              id: 'mk-1',
              geometry: { type: 'Point', coordinates: [-77.5, 39.5] },
              properties: { class: 'Marker', title: 'Aid 1', 'marker-color': 'FF0000' },
            },
            {
              id: 'folder-1',
              geometry: { type: 'Point', coordinates: [0, 0] },
              properties: { class: 'Folder', title: 'Stuff' },
            },
            'not a feature',
          ],
        },
      },
    });

    const features = await provider.fetchFeatures();

    expect(getSpy).toHaveBeenCalledWith('/api/v1/map/ABC12/since/0');
    expect(features.routes).toEqual([
      { title: 'Course', coordinates: [{ lat: 39, lon: -77 }, { lat: 39.001, lon: -77.001 }] },
      { title: 'Detour', coordinates: [{ lat: 40, lon: -78 }, { lat: 40.1, lon: -78.1 }] },
    ]);
    expect(features.markers).toEqual([
      {
        id: 'mk-1',
        title: 'Aid 1',
        lat: 39.5,
        lon: -77.5,
        properties: { class: 'Marker', title: 'Aid 1', 'marker-color': 'FF0000' },
      },
    ]);
    expect(features.url).toBe('https://caltopo.com/m/ABC12');
  });

  it('raises MapFeaturesError when the response has no feature list', async () => {
    jest.spyOn(client, 'get').mockResolvedValue({ result: {} });

    await expect(provider.fetchFeatures()).rejects.toThrow(
      new MapFeaturesError('No features found for map ABC12'),
    );
  });
});
