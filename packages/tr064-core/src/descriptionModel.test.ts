import { describe, it, expect } from 'vitest';
import { Action, Description, Device, Service, ServiceSchema } from './descriptionModel';
import type { ServiceInfo } from './types';

const serviceInfo = (serviceId: string, controlURL: string = '/upnp/control/x'): ServiceInfo => ({
  serviceType: 'urn:dslforum-org:service:Test:1',
  serviceId,
  controlURL,
  eventSubURL: controlURL,
  SCPDURL: '/x.xml',
});

const schema = () => new ServiceSchema(
  [new Action('GetTotal', [
    { name: 'NewIndex', direction: 'in', relatedStateVariable: 'Index' },
    { name: 'NewTotal', direction: 'out', relatedStateVariable: 'Total' },
  ])],
  [
    { name: 'Index', dataType: 'ui2', allowedValues: [] },
    { name: 'Total', dataType: 'UI4', allowedValues: [] },
  ],
);

describe('Action', () => {
  it('splits arguments by direction and keeps their order', () => {
    const action = new Action('Mixed', [
      { name: 'A', direction: 'in', relatedStateVariable: 'VA' },
      { name: 'B', direction: 'out', relatedStateVariable: 'VB' },
      { name: 'C', direction: 'in', relatedStateVariable: 'VC' },
    ]);
    expect(action.inArguments.map(arg => arg.name)).toEqual(['A', 'C']);
    expect(action.outArguments.map(arg => arg.name)).toEqual(['B']);
    expect(action.getArgument('C')?.relatedStateVariable).toBe('VC');
    expect(action.getArgument('D')).toBeUndefined();
  });
});

describe('Service', () => {
  it('takes its name from the last segment of the service id', () => {
    expect(new Service(serviceInfo('urn:upnp-org:serviceId:WANIPConn1')).name).toBe('WANIPConn1');
    expect(new Service(serviceInfo('plain')).name).toBe('plain');
  });

  it('has no actions until a schema is attached', () => {
    const service = new Service(serviceInfo('urn:x:serviceId:Test1'));
    expect(service.schemaLoaded).toBe(false);
    expect(service.actions.size).toBe(0);
    service.attachSchema(schema());
    expect(service.schemaLoaded).toBe(true);
    expect(service.hasAction('GetTotal')).toBe(true);
  });

  it('attaches a schema only once', () => {
    const service = new Service(serviceInfo('urn:x:serviceId:Test1'), schema());
    expect(() => service.attachSchema(ServiceSchema.empty())).toThrow("Schema of service 'Test1' is already attached");
  });

  it('resolves data types through its schema', () => {
    const service = new Service(serviceInfo('urn:x:serviceId:Test1'), schema());
    const total = service.getAction('GetTotal')?.getArgument('NewTotal');
    expect(total && service.resolveDataType(total)).toBe('ui4');
  });
});

describe('Device', () => {
  it('walks services depth first and keeps the first of duplicate names', () => {
    const leaf = new Device({ deviceType: 'leaf' }, [new Service(serviceInfo('urn:x:serviceId:Shared1', '/leaf'))]);
    const middle = new Device({ deviceType: 'middle' }, [new Service(serviceInfo('urn:x:serviceId:Middle1'))], [leaf]);
    const root = new Device({ deviceType: 'root', modelName: 'Model' }, [
      new Service(serviceInfo('urn:x:serviceId:Root1')),
      new Service(serviceInfo('urn:x:serviceId:Shared1', '/root')),
    ], [middle]);

    expect([...root.allServices()].map(service => service.controlURL === '/leaf' ? 'Shared1@leaf' : service.name))
      .toEqual(['Root1', 'Shared1', 'Middle1', 'Shared1@leaf']);
    const services = root.collectServices();
    expect([...services.keys()]).toEqual(['Root1', 'Shared1', 'Middle1']);
    expect(services.get('Shared1')?.controlURL).toBe('/root');
    expect(root.manufacturer).toBe('');
  });
});

describe('Description', () => {
  it('survives a JSON round trip with its schemas', () => {
    const service = new Service(serviceInfo('urn:x:serviceId:Test1'), schema());
    const description = new Description(
      new Device({ modelName: 'Model', UDN: 'uuid:1' }, [service], [new Device({ deviceType: 'child' })]),
      { major: 1, minor: 0 },
      { hardwareCode: '185', major: '154', minor: '7', patch: '29', buildNumber: '101308', display: '154.07.29' },
    );
    const restored = Description.fromJSON(JSON.parse(JSON.stringify(description)));

    expect(restored.toJSON()).toEqual(description.toJSON());
    expect(restored.systemVersionString).toBe('7.29');
    const restoredService = restored.services.get('Test1');
    expect(restoredService?.schemaLoaded).toBe(true);
    expect(restoredService?.getAction('GetTotal')?.outArguments.map(arg => arg.name)).toEqual(['NewTotal']);
    expect(restored.device.devices[0].deviceType).toBe('child');
  });

  it('serializes a service without schema as null', () => {
    expect(new Service(serviceInfo('urn:x:serviceId:Test1')).toJSON().schema).toBeNull();
  });
});
