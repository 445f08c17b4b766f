import { describe, it, expect, vi } from 'vitest';
import path from 'path';
import { loadSource, parseDeviceDescription, parseServiceSchema } from './descriptionProcessor';
import { ConnectionError, ResourceError } from './errors';
import { createNullLogger } from './logger';
import { FakeTransport, FIXTURES_DIR, htmlResponse, readFixture, xmlResponse } from './testSupport';

describe('parseDeviceDescription', () => {
  it('reads versions and the root device', async () => {
    const description = await parseDeviceDescription(readFixture('tr64desc.xml'));
    expect(description.specVersion).toEqual({ major: 1, minor: 0 });
    expect(description.modelName).toBe('Test Router 7000');
    expect(description.systemVersionString).toBe('7.29');
    expect(description.systemInfo).toEqual(['185', '154', '7', '29', '101308', '154.07.29']);
    expect(description.device.UDN).toBe('uuid:739f2409-bccb-40e7-8e6c-001122334455');
    expect(description.device.info.presentationURL).toBe('http://router.test');
    expect(description.device.info.UPC).toBe('');
  });

  it('builds the nested device tree', async () => {
    const { device } = await parseDeviceDescription(readFixture('tr64desc.xml'));
    expect(device.devices).toHaveLength(1);
    const wanDevice = device.devices[0];
    expect(wanDevice.deviceType).toBe('urn:dslforum-org:device:WANDevice:1');
    expect(wanDevice.devices[0].services.map(service => service.name)).toEqual(['WANIPConnection1']);
  });

  it('collects the services of all devices by name', async () => {
    const description = await parseDeviceDescription(readFixture('tr64desc.xml'));
    expect([...description.services.keys()]).toEqual([
      'DeviceInfo1',
      'DeviceConfig1',
      'LANConfigSecurity1',
      'WANCommonInterfaceConfig1',
      'WANIPConnection1',
    ]);
    const service = description.services.get('WANIPConnection1');
    expect(service?.serviceType).toBe('urn:dslforum-org:service:WANIPConnection:1');
    expect(service?.controlURL).toBe('/upnp/control/wanipconnection1');
    expect(service?.SCPDURL).toBe('/wanipconnSCPD.xml');
    expect(service?.schemaLoaded).toBe(false);
  });

  it('logs unknown elements at trace level', async () => {
    const logger = createNullLogger();
    const trace = vi.spyOn(logger, 'trace');
    await parseDeviceDescription(readFixture('tr64desc.xml'), logger);
    expect(trace).toHaveBeenCalledTimes(1);
    expect(trace).toHaveBeenCalledWith("[parseDevice] ignoring unknown element 'X_vendorExtension'");
  });

  it('has no system version without a systemVersion element', async () => {
    const description = await parseDeviceDescription(readFixture('igddesc.xml'));
    expect(description.systemVersion).toBeNull();
    expect(description.systemVersionString).toBeNull();
    expect(description.systemInfo).toBeNull();
  });

  it('raises ConnectionError for malformed documents', async () => {
    await expect(parseDeviceDescription('<root><device>')).rejects.toBeInstanceOf(ConnectionError);
    await expect(parseDeviceDescription('<root><specVersion/></root>')).rejects.toThrow('Device description without a <device> element');
  });
});

describe('parseServiceSchema', () => {
  it('reads actions with ordered arguments', async () => {
    const schema = await parseServiceSchema(readFixture('wanipconnSCPD.xml'));
    expect([...schema.actions.keys()]).toEqual(['GetStatusInfo', 'ForceTermination', 'SetConnectionType', 'X_GetDetails']);
    const getStatusInfo = schema.actions.get('GetStatusInfo');
    expect(getStatusInfo?.outArguments.map(arg => arg.name)).toEqual(['NewConnectionStatus', 'NewLastConnectionError', 'NewUptime']);
    expect(schema.actions.get('ForceTermination')?.arguments).toEqual([]);
    expect(schema.actions.get('SetConnectionType')?.inArguments).toEqual([
      { name: 'NewConnectionType', direction: 'in', relatedStateVariable: 'ConnectionType' },
    ]);
  });

  it('reads state variables', async () => {
    const schema = await parseServiceSchema(readFixture('wanipconnSCPD.xml'));
    expect(schema.stateVariables.get('ConnectionStatus')).toEqual({
      name: 'ConnectionStatus',
      dataType: 'string',
      allowedValues: ['Unconfigured', 'Connecting', 'Connected', 'Disconnected'],
      sendEvents: true,
    });
    expect(schema.stateVariables.get('LastChange')?.dataType).toBe('dateTime');
    expect(schema.specVersion).toEqual({ major: 1, minor: 0 });
  });

  it('reads defaults and value ranges', async () => {
    const schema = await parseServiceSchema(readFixture('deviceinfoSCPD.xml'));
    expect(schema.stateVariables.get('SecurityPort')).toEqual({
      name: 'SecurityPort',
      dataType: 'ui2',
      defaultValue: '49443',
      allowedValues: [],
      allowedValueRange: { minimum: '1', maximum: '65535' },
      sendEvents: false,
    });
  });

  it('resolves data types in lower case through the state variable', async () => {
    const schema = await parseServiceSchema(readFixture('wanipconnSCPD.xml'));
    const details = schema.actions.get('X_GetDetails');
    const lastChange = details?.getArgument('NewLastChange');
    expect(lastChange && schema.resolveDataType(lastChange)).toBe('datetime');
    const counter = details?.getArgument('NewVendorCounter');
    expect(counter && schema.resolveDataType(counter)).toBeUndefined();
  });

  it('warns about arguments without a state variable', async () => {
    const logger = createNullLogger();
    const warn = vi.spyOn(logger, 'warn');
    const schema = await parseServiceSchema(readFixture('wanipconnSCPD.xml'), logger, 'WANIPConnection1');
    expect(schema.unresolvedArguments().map(entry => entry.argument.name)).toEqual(['NewVendorCounter']);
    expect(warn).toHaveBeenCalledWith(
      "[parseServiceSchema] WANIPConnection1.X_GetDetails: argument 'NewVendorCounter' refers to unknown state variable 'UndeclaredCounter'",
    );
  });

  it('accepts actions without arguments and an empty state table', async () => {
    const schema = await parseServiceSchema(readFixture('deviceconfigSCPD.xml'));
    expect(schema.actions.get('Reboot')?.arguments).toEqual([]);
    expect(schema.stateVariables.size).toBe(0);
  });

  it('raises ResourceError for malformed documents', async () => {
    await expect(parseServiceSchema(readFixture('layer3forwardingSCPD.xml'), createNullLogger(), 'L3Forwarding1'))
      .rejects.toThrow("Malformed service description for 'L3Forwarding1'");
    await expect(parseServiceSchema('<scpd>')).rejects.toBeInstanceOf(ResourceError);
  });
});

describe('loadSource', () => {
  const transport = new FakeTransport()
    .on('http://router.test:49000/tr64desc.xml', xmlResponse('<root/>'))
    .on('http://router.test:49000/login.xml', htmlResponse(200, '<html><body>Login</body></html>'));

  it('returns XML strings as they are', async () => {
    await expect(loadSource('  <root/>', transport)).resolves.toBe('  <root/>');
  });

  it('fetches URLs', async () => {
    await expect(loadSource('http://router.test:49000/tr64desc.xml', transport)).resolves.toBe('<root/>');
  });

  it('rejects missing documents and HTML answers', async () => {
    await expect(loadSource('http://router.test:49000/missing.xml', transport))
      .rejects.toThrow("Resource 'http://router.test:49000/missing.xml' not available (HTTP 404)");
    await expect(loadSource('http://router.test:49000/login.xml', transport)).rejects.toBeInstanceOf(ResourceError);
  });

  it('reads files', async () => {
    await expect(loadSource(path.join(FIXTURES_DIR, 'any.xml'), transport)).resolves.toBe(readFixture('any.xml'));
    await expect(loadSource(path.join(FIXTURES_DIR, 'missing.xml'), transport)).rejects.toBeInstanceOf(ResourceError);
  });
});
