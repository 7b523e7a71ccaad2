// Public entry point: contract, synthesizer, verifier, registry, transports and drivers

export * from './devices/types.js';
export * from './devices/errors.js';
export { config, loadConfig, type LabDevicesConfig } from './config.js';

export {
  CONTRACT_VERSION,
  CAPABILITY_CONTRACT,
  checkContract,
  getContractMember,
  type ContractMember,
  type ContractProblem,
} from './devices/contract.js';
export { SemanticTypes, placeholderFor, schemaFor, formatType, isSynthesizable } from './devices/placeholders.js';
export { createDevice, describeDriver, formatMember, type CreateDeviceOptions } from './devices/descriptor.js';
export {
  synthesizeDummy,
  getDummyCalls,
  clearDummyCalls,
  isDummy,
  isDummyDefinition,
  DUMMY_SUFFIX,
  type DummyCall,
} from './devices/dummy.js';
export {
  verifyDriver,
  verifyRegistry,
  type ContractViolation,
  type VerificationReport,
  type ViolationKind,
} from './devices/verifier.js';
export { createDriverRegistry, type DriverRegistry, type DriverPair } from './devices/registry.js';
export { createDefaultRegistry } from './devices/catalog.js';
export { ScpiParser } from './devices/scpi-parser.js';

export { createNullTransport } from './devices/transports/null.js';
export { createSerialTransport, listSerialPorts, type SerialConfig } from './devices/transports/serial.js';
export { createTcpTransport, SCPI_RAW_PORT, type TcpConfig } from './devices/transports/tcp.js';
export { createUSBTMCTransport, usbDeviceLocator, findUSBTMCDevices, type USBTMCConfig } from './devices/transports/usbtmc.js';
export { createUdpTransport, ESCL_DEVICE_PORT, ESCL_HOST_PORT, type UdpConfig } from './devices/transports/udp.js';
export { createPrologixTransport, PROLOGIX_PORT, type PrologixConfig } from './devices/transports/prologix.js';
export { parseVisaAddress, transportForAddress, type VisaAddress } from './devices/transports/visa-address.js';

export { TSP01, TSP01Dummy, type TSP01Device } from './devices/drivers/thorlabs-tsp01.js';
export { SMC100, SMC100Dummy, type SMC100Device } from './devices/drivers/newport-smc100.js';
export { TPG362, TPG362Dummy, type TPG362Device } from './devices/drivers/pfeiffer-tpg362.js';
export { LocalOscillator, LocalOscillatorDummy, type LocalOscillatorDevice } from './devices/drivers/kuhne-local-oscillator.js';
export { GP350, GP350Dummy, type GP350Device } from './devices/drivers/granville-phillips-gp350.js';
export { DG645, DG645Dummy, type DG645Device } from './devices/drivers/srs-dg645.js';
export {
  KeysightOscilloscope,
  KeysightOscilloscopeDummy,
  type KeysightOscilloscopeDevice,
} from './devices/drivers/keysight-oscilloscope.js';
export { RTB2000, RTB2000Dummy, type RTB2000Device } from './devices/drivers/rohde-schwarz-rtb2000.js';
export { FPC1000, FPC1000Dummy, type FPC1000Device } from './devices/drivers/rohde-schwarz-fpc1000.js';
export { STF03D, STF03DDummy, type STF03DDevice } from './devices/drivers/applied-motion-stf03d.js';
export {
  AndoSpectrumAnalyzer,
  AndoSpectrumAnalyzerDummy,
  type AndoDevice,
} from './devices/drivers/ando-spectrum-analyzer.js';
