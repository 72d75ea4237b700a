export { deriveVpd, saturationVaporPressure } from './vpd';
