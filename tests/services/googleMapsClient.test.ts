import { GoogleMapsClient, formatComponents } from '../../src/services/googleMapsClient';
import { ConfigurationError, MapsApiError } from '../../src/utils/errors';
import { rivoliGeocodeResult } from '../fixtures/googleMaps';

const mockGet = jest.fn();
const mockCreate = jest.fn((_config: unknown) => ({ get: mockGet }));

jest.mock('axios', () => ({
  __esModule: true,
  default: {
    create: (config: unknown) => mockCreate(config)
  }
}));

const settings = {
  apiKey: 'test-key',
  baseUrl: 'https://maps.test.local/maps/api',
  timeoutMs: 5000,
  cacheTtlSeconds: 60
};

describe('GoogleMapsClient', () => {
  let client: GoogleMapsClient;

  beforeEach(() => {
    jest.clearAllMocks();
    client = new GoogleMapsClient(settings);
  });

  afterEach(() => {
    client.clearCache();
  });

  it('should configure axios with the base url, timeout and key', () => {
    expect(mockCreate).toHaveBeenCalledWith({
      baseURL: 'https://maps.test.local/maps/api',
      timeout: 5000,
      params: { key: 'test-key' }
    });
  });

  it('should refuse to start without an API key', () => {
    expect(() => new GoogleMapsClient({ ...settings, apiKey: '' })).toThrow(ConfigurationError);
  });

  describe('geocode', () => {
    it('should send the address, components and language', async () => {
      mockGet.mockResolvedValue({ data: { status: 'OK', results: [rivoliGeocodeResult()] } });

      const results = await client.geocode({
        address: '10 rue de rivoli',
        components: { country: 'france', postal_code: '75004' },
        language: 'fr'
      });

      expect(results).toHaveLength(1);
      expect(mockGet).toHaveBeenCalledWith('/geocode/json', {
        params: { address: '10 rue de rivoli', components: 'country:france|postal_code:75004', language: 'fr' }
      });
    });

    it('should resolve with an empty list on ZERO_RESULTS', async () => {
      mockGet.mockResolvedValue({ data: { status: 'ZERO_RESULTS', results: [] } });

      await expect(client.geocode({ address: 'nowhere' })).resolves.toEqual([]);
    });

    it('should serve repeated requests from the cache', async () => {
      mockGet.mockResolvedValue({ data: { status: 'OK', results: [rivoliGeocodeResult()] } });

      await client.geocode({ address: '10 rue de rivoli' });
      await client.geocode({ address: '10 rue de rivoli' });

      expect(mockGet).toHaveBeenCalledTimes(1);
    });

    it('should raise a MapsApiError on an error status', async () => {
      mockGet.mockResolvedValue({ data: { status: 'REQUEST_DENIED', error_message: 'The provided API key is invalid.' } });

      await expect(client.geocode({ address: '10 rue de rivoli' })).rejects.toThrow(
        new MapsApiError('REQUEST_DENIED: The provided API key is invalid.', '/geocode/json', 'REQUEST_DENIED')
      );
    });

    it('should raise a MapsApiError on a transport failure', async () => {
      mockGet.mockRejectedValue(new Error('socket hang up'));

      await expect(client.geocode({ address: '10 rue de rivoli' })).rejects.toBeInstanceOf(MapsApiError);
    });
  });

  it('should reverse geocode a lat,lng pair', async () => {
    mockGet.mockResolvedValue({ data: { status: 'OK', results: [] } });

    await client.reverseGeocode({ latlng: { latitude: 48.8556, longitude: 2.3601 } });

    expect(mockGet).toHaveBeenCalledWith('/geocode/json', { params: { latlng: '48.8556,2.3601' } });
  });

  it('should request fields from find place', async () => {
    mockGet.mockResolvedValue({ data: { status: 'OK', candidates: [{ place_id: 'abc' }] } });

    const found = await client.findPlace({ input: '0100000000', inputType: 'phonenumber', language: 'fr' });

    expect(found.candidates).toEqual([{ place_id: 'abc' }]);
    expect(mockGet).toHaveBeenCalledWith('/place/findplacefromtext/json', {
      params: {
        input: '0100000000',
        inputtype: 'phonenumber',
        fields: 'place_id,name,formatted_address,geometry,types',
        language: 'fr'
      }
    });
  });

  it('should return autocomplete predictions', async () => {
    mockGet.mockResolvedValue({ data: { status: 'OK', predictions: [{ place_id: 'abc', description: 'Rue' }] } });

    await expect(client.placesAutocomplete({ input: 'rue', offset: 3 })).resolves.toEqual([
      { place_id: 'abc', description: 'Rue' }
    ]);
    expect(mockGet).toHaveBeenCalledWith('/place/autocomplete/json', { params: { input: 'rue', offset: 3 } });
  });

  it('should search nearby places around a location', async () => {
    mockGet.mockResolvedValue({ data: { status: 'OK', results: [] } });

    await client.placesNearby({ location: { latitude: 1, longitude: 2 }, radius: 100, type: 'cafe' });

    expect(mockGet).toHaveBeenCalledWith('/place/nearbysearch/json', {
      params: { location: '1,2', radius: 100, type: 'cafe' }
    });
  });

  it('should fetch place details by id', async () => {
    mockGet.mockResolvedValue({ data: { status: 'OK', result: { place_id: 'abc' } } });

    await expect(client.place({ placeId: 'abc' })).resolves.toEqual({ status: 'OK', result: { place_id: 'abc' } });
    expect(mockGet).toHaveBeenCalledWith('/place/details/json', { params: { place_id: 'abc' } });
  });

  describe('formatComponents', () => {
    it('should join component filters', () => {
      expect(formatComponents({ country: 'fr', locality: 'Paris' })).toBe('country:fr|locality:Paris');
    });

    it('should omit empty filters', () => {
      expect(formatComponents(null)).toBeUndefined();
      expect(formatComponents({})).toBeUndefined();
    });
  });
});
