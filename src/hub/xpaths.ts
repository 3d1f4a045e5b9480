// src/hub/xpaths.ts
// Object-tree addresses on the hub. Matched by the device exactly as written.

const WAN_DATA = 'Device/IP/Interfaces/Interface[@uid=\'2\']';
const DSL_LINE = 'Device/DSL/Channels/Channel[@uid=\'1\']';
const DHCP_POOL = 'Device/DHCPv4/Server/Pools/Pool[@uid=\'1\']';
const WIFI_24 = 'Device/WiFi/SSIDs/SSID[@uid=\'1\']';
const DSL_MODEM = 'Device/DSL/Lines/Line[@uid=\'1\']';
const HUB_LIGHT = 'Device/UserInterface/X_BT_LEDs';

export const XPATHS = {
	device: 'Device',
	hubVersion: 'Device/DeviceInfo/ModelName',
	softwareVersion: 'Device/DeviceInfo/SoftwareVersion',
	hardwareVersion: 'Device/DeviceInfo/HardwareVersion',
	serialNumber: 'Device/DeviceInfo/SerialNumber',
	maintenanceFirmwareVersion: 'Device/DeviceInfo/X_BT_MaintenanceFirmwareVersion',
	dataPumpVersion: `${DSL_MODEM}/FirmwareVersion`,
	localTime: 'Device/Time/CurrentLocalTime',
	publicIp4: `${WAN_DATA}/IPv4Addresses/IPv4Address[@uid='1']/IPAddress`,
	publicSubnetMask: `${WAN_DATA}/IPv4Addresses/IPv4Address[@uid='1']/SubnetMask`,
	wanInternetStatus: `${WAN_DATA}/Status`,
	dataSent: `${WAN_DATA}/Stats/BytesSent`,
	dataReceived: `${WAN_DATA}/Stats/BytesReceived`,
	interfaceType: 'Device/DeviceInfo/X_BT_BroadbandProductType',
	downstreamCurrRate: `${DSL_LINE}/DownstreamCurrRate`,
	upstreamCurrRate: `${DSL_LINE}/UpstreamCurrRate`,
	dhcpAuthoritative: 'Device/DHCPv4/Server/X_BT_Authoritative',
	dhcpPoolStart: `${DHCP_POOL}/MinAddress`,
	dhcpPoolEnd: `${DHCP_POOL}/MaxAddress`,
	dhcpSubnetMask: `${DHCP_POOL}/SubnetMask`,
	sambaHost: 'Device/Services/StorageServices/NetworkServer/NetBIOSName',
	sambaIp: 'Device/Services/StorageServices/NetworkServer/X_BT_IPAddress',
	wifi24Ssid: `${WIFI_24}/SSID`,
	wifi24SecurityMode: 'Device/WiFi/AccessPoints/AccessPoint[@uid=\'1\']/Security/ModeEnabled',
	hubLightBrightness: `${HUB_LIGHT}/Brightness`,
	hubLightStatus: `${HUB_LIGHT}/Status`,
	connectedDevices: 'Device/Hosts/Hosts',
	bandwidthMonitoring: 'Device/Services/X_BT_BandwidthMonitoring',
	eventLog: 'Device/DeviceInfo/VendorLogFiles/VendorLogFile[@uid=\'1\']',
} as const;

export function hostXPath(id: number): string {
	return `Device/Hosts/Hosts/Host[@uid='${id}']`;
}
