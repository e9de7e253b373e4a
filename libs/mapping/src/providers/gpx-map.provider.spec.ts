import { GpxParseError, parseGpxFeatures } from './gpx-map.provider';

const gpx = (body: string) =>
  `<?xml version="1.0" encoding="UTF-8"?>
<gpx version="1.1" creator="milemark-test" xmlns="http://www.topografix.com/GPX/1/1">
${body}
</gpx>`;

describe('parseGpxFeatures', () => {
  it('turns tracks into routes and waypoints into markers', () => {
    const features = parseGpxFeatures(
      gpx(`
  <wpt lat="39.5" lon="-77.5"><name>Aid 1</name></wpt>
  <trk>
    <name>Course</name>
    <trkseg>
      <trkpt lat="39.0" lon="-77.0"><ele>100</ele></trkpt>
      <trkpt lat="39.001" lon="-77.001"><ele>101</ele></trkpt>
    </trkseg>
  </trk>`),
    );

    expect(features).toEqual({
      routes: [
        { title: 'Course', coordinates: [{ lat: 39, lon: -77 }, { lat: 39.001, lon: -77.001 }] },
      ],
      markers: [{ id: null, title: 'Aid 1', lat: 39.5, lon: -77.5, properties: {} }],
      url: null,
    });
  });

  it('reads planned routes as well as tracks', () => {
    const features = parseGpxFeatures(
      gpx(`
  <rte>
    <name>Alternate</name>
    <rtept lat="40.0" lon="-105.0" />
    <rtept lat="40.01" lon="-105.02" />
  </rte>`),
    );

    expect(features.routes).toEqual([
      { title: 'Alternate', coordinates: [{ lat: 40, lon: -105 }, { lat: 40.01, lon: -105.02 }] },
    ]);
    expect(features.markers).toEqual([]);
  });

  it('rejects empty content', () => {
    expect(() => parseGpxFeatures('  \n')).toThrow(new GpxParseError('GPX content is empty'));
  });

  it('rejects a file with waypoints only', () => {
    expect(() => parseGpxFeatures(gpx('<wpt lat="39.5" lon="-77.5"><name>Aid 1</name></wpt>'))).toThrow(
      new GpxParseError('GPX file contains no tracks or routes'),
    );
  });
});
