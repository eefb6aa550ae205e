import { faker } from '@faker-js/faker';
import type { ClinicStore } from '../store';
import logger from '../utils/logger';
import { localDateString } from '../utils/dates';
import { civilStatuses, sexes, visitTypes } from '../types/records';

/**
 * Seed Service
 * Fills a store with made-up patients and visits for demos and manual
 * testing. Seeded so a run can be reproduced.
 */

export interface SeedOptions {
  patients: number;
  maxVisitsPerPatient?: number;
  seed?: number;
  now?: Date;
}

export interface SeedReport {
  seed: number;
  patients: number;
  visits: number;
}

const pad = (value: number) => String(value).padStart(2, '0');

const oneDecimal = (value: number) => Math.round(value * 10) / 10;

export function seedStore(store: ClinicStore, options: SeedOptions): SeedReport {
  const seed = options.seed ?? Math.floor(Math.random() * 1_000_000_000);
  const now = options.now ?? new Date();
  const maxVisits = options.maxVisitsPerPatient ?? 6;
  faker.seed(seed);

  const earliestVisit = new Date(now.getFullYear() - 3, 0, 1);
  let visits = 0;

  for (let i = 0; i < options.patients; i++) {
    const sex = faker.helpers.arrayElement(sexes);
    const birth = faker.date.birthdate({ min: 0, max: 90, mode: 'age', refDate: now });

    const patient = store.createPatient({
      lastName: faker.person.lastName(),
      firstName: faker.person.firstName(sex === 'M' ? 'male' : 'female'),
      middleName: faker.helpers.maybe(() => faker.person.lastName(), { probability: 0.7 }),
      dateOfBirth: localDateString(birth),
      sex,
      civilStatus: faker.helpers.arrayElement(civilStatuses),
      contactNumber: `09${faker.string.numeric(9)}`,
      address: `${faker.location.streetAddress()}, ${faker.location.city()}`,
    });

    // Visits fall within the last three years, never before birth
    const from = birth > earliestVisit ? birth : earliestVisit;
    const count = faker.number.int({ min: 0, max: maxVisits });

    for (let v = 0; v < count; v++) {
      const day = faker.date.between({ from, to: now });

      store.createVisit({
        patientId: patient.id,
        visitDate: localDateString(day),
        visitTime: `${pad(faker.number.int({ min: 8, max: 17 }))}:${pad(faker.number.int({ min: 0, max: 59 }))}`,
        weightKg: oneDecimal(faker.number.float({ min: 3, max: 110 })),
        heightCm: oneDecimal(faker.number.float({ min: 50, max: 190 })),
        bloodPressure: `${faker.number.int({ min: 90, max: 140 })}/${faker.number.int({ min: 60, max: 90 })}`,
        temperatureC: oneDecimal(faker.number.float({ min: 36, max: 39.5 })),
        notes: faker.helpers.maybe(() => faker.lorem.sentence(), { probability: 0.5 }),
        visitType: faker.helpers.arrayElement(visitTypes),
      });
      visits++;
    }
  }

  logger.info('Store seeded', { seed, patients: options.patients, visits });
  return { seed, patients: options.patients, visits };
}
