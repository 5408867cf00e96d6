/** 1 iOS, 2 Android, 3 Windows, 4 macOS, 5 Linux. 0 selects every OS where accepted. */
export type TDeviceOsType = 0 | 1 | 2 | 3 | 4 | 5

export type TListDevicesFilter = {
  /** Username in email format. */
  username?: string
  osType?: Exclude<TDeviceOsType, 0>
}

export type TRemoveDevicesRequest = {
  companyId: number
  /** Up to 30 device UDIDs per call. */
  udids: string[]
  osType?: TDeviceOsType
}

export type TForceRemoveDevicesRequest = {
  udids?: string[]
  osType?: TDeviceOsType
}
