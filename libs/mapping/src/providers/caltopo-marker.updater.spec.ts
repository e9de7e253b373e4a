import { CaltopoClient } from './caltopo.client';
import { CaltopoMarkerUpdater } from './caltopo-marker.updater';

const credentials = { credentialId: 'CRED1', key: Buffer.from('test-secret').toString('base64') };

describe('CaltopoMarkerUpdater', () => {
  let fetchSpy: jest.SpyInstance;
  let updater: CaltopoMarkerUpdater;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
    const client = new CaltopoClient(credentials, 'https://caltopo.com', () => 1_000_000);
    updater = new CaltopoMarkerUpdater(client, 'ABC12');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('updates an existing marker in place', async () => {
    fetchSpy.mockResolvedValueOnce(new Response(JSON.stringify({ status: 'ok' })));

    const saved = await updater.saveMarker({
      id: 'mk-1',
      title: 'Runner',
      lat: 39.5,
      lon: -76.5,
      properties: { 'marker-color': 'A200FF', 'marker-rotation': 90 },
    });

    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('https://caltopo.com/api/v1/map/ABC12/Marker/mk-1');
    const form = new URLSearchParams(String(init.body));
    expect(form.get('json')).toBe(
      '{"type":"Feature","id":"mk-1","geometry":{"type":"Point","coordinates":[-76.5,39.5]},' +
        '"properties":{"marker-color":"A200FF","marker-rotation":90,"title":"Runner","class":"Marker"}}',
    );
    expect(form.get('signature')).toBe('3IW5FhSx8xBh0g3RgeAhxwgg2nKXZ37cMQMGVsjBDyE=');
    expect(saved.id).toBe('mk-1');
  });

  it('creates a marker without an id and adopts the id CalTopo assigns', async () => {
    fetchSpy.mockResolvedValueOnce(new Response(JSON.stringify({ result: { id: 'new-7' } })));

    const saved = await updater.saveMarker({
      id: null,
      title: 'Runner (estimated)',
      lat: 39.25,
      lon: -76.75,
      properties: {},
    });

    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('https://caltopo.com/api/v1/map/ABC12/Marker');
    const form = new URLSearchParams(String(init.body));
    expect(JSON.parse(form.get('json') ?? '')).toEqual({
      type: 'Feature',
      id: null,
      geometry: { type: 'Point', coordinates: [-76.75, 39.25] },
      properties: { title: 'Runner (estimated)', class: 'Marker' },
    });
    expect(saved).toEqual({
      id: 'new-7',
      title: 'Runner (estimated)',
      lat: 39.25,
      lon: -76.75,
      properties: {},
    });
  });
});
