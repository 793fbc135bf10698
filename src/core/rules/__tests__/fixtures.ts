import { StaticDocumentProvider } from '../../../services/reference/static-provider.js';

export const TEST_BLOCKS: Readonly<Record<string, string>> = {
  'Port Halvard': 'Port HalvardCountryNorlandPopulation (2020[1])412,906 Rank4th',
  'Vessenmoor University':
    'Vessenmoor UniversityEstablishedMarch 14, 1811; 214 years ago (1811-03-14)Undergraduates18,775 (fall 2023)[2]',
  'Ilsa Marrow': 'Ilsa MarrowBorn(1894-07-22)22 July 1894Port Halvard',
  'Tavros': 'TavrosMean radius31,200 kmPolar radius30,420 kmFlattening0.0509',
  'Grey Hollow': 'Grey HollowVillageElevation312 m',
};

export function createTestProvider(): StaticDocumentProvider {
  return new StaticDocumentProvider(TEST_BLOCKS);
}
