/**
 * Driver Catalog
 * Every shipped driver, paired with the dummy its module synthesizes.
 */

import { createDriverRegistry, type DriverRegistry } from './registry.js';
import { TSP01, TSP01Dummy } from './drivers/thorlabs-tsp01.js';
import { SMC100, SMC100Dummy } from './drivers/newport-smc100.js';
import { TPG362, TPG362Dummy } from './drivers/pfeiffer-tpg362.js';
import { LocalOscillator, LocalOscillatorDummy } from './drivers/kuhne-local-oscillator.js';
import { GP350, GP350Dummy } from './drivers/granville-phillips-gp350.js';
import { DG645, DG645Dummy } from './drivers/srs-dg645.js';
import { KeysightOscilloscope, KeysightOscilloscopeDummy } from './drivers/keysight-oscilloscope.js';
import { RTB2000, RTB2000Dummy } from './drivers/rohde-schwarz-rtb2000.js';
import { FPC1000, FPC1000Dummy } from './drivers/rohde-schwarz-fpc1000.js';
import { STF03D, STF03DDummy } from './drivers/applied-motion-stf03d.js';
import { AndoSpectrumAnalyzer, AndoSpectrumAnalyzerDummy } from './drivers/ando-spectrum-analyzer.js';

export function createDefaultRegistry(): DriverRegistry {
  const registry = createDriverRegistry();

  registry.register(TSP01, TSP01Dummy);
  registry.register(SMC100, SMC100Dummy);
  registry.register(TPG362, TPG362Dummy);
  registry.register(LocalOscillator, LocalOscillatorDummy);
  registry.register(GP350, GP350Dummy);
  registry.register(DG645, DG645Dummy);
  registry.register(KeysightOscilloscope, KeysightOscilloscopeDummy);
  registry.register(RTB2000, RTB2000Dummy);
  registry.register(FPC1000, FPC1000Dummy);
  registry.register(STF03D, STF03DDummy);
  registry.register(AndoSpectrumAnalyzer, AndoSpectrumAnalyzerDummy);

  return registry;
}
