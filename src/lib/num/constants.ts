/**
 * Named mathematical and physical constants, SI prefixes and common fractions.
 *
 * Built once, on first import, from the public constructors and operators.
 */

import { HugeNumber } from './HugeNumber.js';

const n = (mantissa: bigint | number, exponent = 0): HugeNumber => HugeNumber.fromComponents(mantissa, exponent);
const frac = (numerator: number, denominator: number): HugeNumber => HugeNumber.fromFraction(numerator, denominator);

// ============================================================================
// Numbers
// ============================================================================

export const Two = HugeNumber.TWO;
export const Ten = HugeNumber.TEN;
export const Half = frac(1, 2);
export const Third = frac(1, 3);
export const TwoThirds = frac(2, 3);
export const Fourth = frac(1, 4);
export const ThreeFourths = frac(3, 4);
export const Eighth = frac(1, 8);
export const ThreeHalves = frac(3, 2);

// SI prefixes
export const Yocto = n(1, -24);
export const Zepto = n(1, -21);
export const Atto = n(1, -18);
export const Femto = n(1, -15);
export const Pico = n(1, -12);
export const Nano = n(1, -9);
export const Micro = n(1, -6);
export const Milli = frac(1, 1000);
export const Centi = frac(1, 100);
export const Deci = frac(1, 10);
export const Deca = n(10);
export const Hecto = n(100);
export const Kilo = n(1000);
export const Mega = n(1_000_000);
export const Giga = n(1_000_000_000);
export const Tera = n(1, 12);
export const Peta = n(1, 15);
export const Exa = n(1, 18);
export const Zetta = n(1, 21);
export const Yotta = n(1, 24);

// ============================================================================
// Math
// ============================================================================

export const E = HugeNumber.E;
export const Pi = HugeNumber.PI;
export const Tau = HugeNumber.TAU;
export const Ln2 = HugeNumber.LN2;
export const Ln10 = HugeNumber.LN10;
export const Phi = n(161803398874989485n, -17);
export const Root2 = n(141421356237309505n, -17);

export const TwoPi = Tau;
export const HalfPi = Pi.mul(Half);
export const QuarterPi = Pi.div(4);
export const EighthPi = Pi.div(8);
export const SixthPi = Pi.div(6);
export const ThirdPi = Pi.mul(Third);
export const ThreePi = Tau.add(Pi);
export const FourPi = Tau.mul(2);
export const ThreeHalvesPi = ThreePi.mul(Half);
export const ThreeQuartersPi = ThreePi.div(4);
export const FourThirdsPi = FourPi.mul(Third);
export const PiSquared = Pi.square();
export const TwoPiSquared = PiSquared.mul(2);
export const InverseE = E.reciprocal();
export const InversePi = Pi.reciprocal();
export const PiOver180 = Pi.div(180);
export const OneEightyOverPi = n(180).div(Pi);

// ============================================================================
// Science (SI units)
// ============================================================================

export const Avogadro = n(602214076, 15);
export const Boltzmann = n(1380649, -29);
export const ElectronMass = n(910938356, -39);
export const ElementaryCharge = n(1602176634, -28);
export const GravitationalConstant = n(667408, -16);
export const TwoG = GravitationalConstant.mul(2);
export const HeatOfVaporizationOfWater = n(2_501_000);
export const HeatOfVaporizationOfWaterSquared = HeatOfVaporizationOfWater.square();
export const LightYear = n(9_460_730_472_580_800n);
export const MolarMassOfAir = n(289644, -7);
export const NeutronMass = n(1674927471, -36);
export const Planck = n(662607015, -42);
export const ProtonMass = n(1672621898, -36);
export const RSpecificDryAir = n(287);
export const RSpecificWater = n(4615, -1);
export const RSpecificRatioOfDryAirToWater = RSpecificDryAir.div(RSpecificWater);
export const CpDryAir = n(10035, -1);
export const CpTimesRSpecificDryAir = CpDryAir.mul(RSpecificDryAir);
export const RSpecificOverCpDryAir = RSpecificDryAir.div(CpDryAir);
export const SpeedOfLight = n(299_792_458);
export const SpeedOfLightSquared = SpeedOfLight.square();
export const StandardAtmosphericPressure = n(101325, -3);
export const StefanBoltzmann = n(5670367, -14);
export const FourSigma = StefanBoltzmann.mul(4);
export const UniversalGasConstant = n(83144598, -7);
export const MolarMassOfAirOverR = MolarMassOfAir.div(UniversalGasConstant);

/** Every constant by name, for lookup from text */
export const NAMED_CONSTANTS: ReadonlyMap<string, HugeNumber> = new Map(Object.entries({
  Two, Ten, Half, Third, TwoThirds, Fourth, ThreeFourths, Eighth, ThreeHalves, Yocto, Zepto, Atto,
  Femto, Pico, Nano, Micro, Milli, Centi, Deci, Deca, Hecto, Kilo, Mega, Giga, Tera, Peta, Exa,
  Zetta, Yotta, E, Pi, Tau, Ln2, Ln10, Phi, Root2, TwoPi, HalfPi, QuarterPi, EighthPi, SixthPi,
  ThirdPi, ThreePi, FourPi, ThreeHalvesPi, ThreeQuartersPi, FourThirdsPi, PiSquared, TwoPiSquared,
  InverseE, InversePi, PiOver180, OneEightyOverPi, Avogadro, Boltzmann, ElectronMass,
  ElementaryCharge, GravitationalConstant, TwoG, HeatOfVaporizationOfWater,
  HeatOfVaporizationOfWaterSquared, LightYear, MolarMassOfAir, NeutronMass, Planck, ProtonMass,
  RSpecificDryAir, RSpecificWater, RSpecificRatioOfDryAirToWater, CpDryAir, CpTimesRSpecificDryAir,
  RSpecificOverCpDryAir, SpeedOfLight, SpeedOfLightSquared, StandardAtmosphericPressure,
  StefanBoltzmann, FourSigma, UniversalGasConstant, MolarMassOfAirOverR,
}));

/** Case-insensitive lookup */
export function constantByName(name: string): HugeNumber | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of NAMED_CONSTANTS) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}
