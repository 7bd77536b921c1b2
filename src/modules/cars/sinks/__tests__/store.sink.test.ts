/**
 * Store Sink Tests
 */

import { StoreSink } from '../store.sink';
import { InMemoryCarStore } from '../../../../__tests__/helpers/mocks';
import { CarRecord } from '../../car.types';

const buildCar = (id: number): CarRecord => ({
  url: `https://auto.example.com/uk/auto_${id}.html`,
  title: `Car ${id}`,
  priceUsd: 1000 * id,
  odometerKm: 0,
  sellerName: 'Unknown',
  phoneNumber: '',
  imageUrl: null,
  imagesCount: 0,
  vin: '',
  plateNumber: '',
  discoveredAt: new Date('2024-05-01T00:00:00.000Z'),
});

describe('StoreSink', () => {
  it('should insert the whole batch', async () => {
    const store = new InMemoryCarStore();

    await expect(new StoreSink(store).write([buildCar(1), buildCar(2)])).resolves.toEqual({
      sink: 'store',
      written: 2,
    });
    expect(Array.from(store.cars.keys())).toEqual([buildCar(1).url, buildCar(2).url]);
  });

  it('should skip an empty batch', async () => {
    const store = new InMemoryCarStore();
    const insert = jest.spyOn(store, 'insertBatch');

    await new StoreSink(store).write([]);

    expect(insert).not.toHaveBeenCalled();
  });

  it('should drop the batch without throwing when the insert fails', async () => {
    const store = new InMemoryCarStore([buildCar(2).url]);

    await expect(new StoreSink(store).write([buildCar(1), buildCar(2)])).resolves.toEqual({
      sink: 'store',
      written: 0,
    });
    expect(store.cars.has(buildCar(1).url)).toBe(false);
  });
});
