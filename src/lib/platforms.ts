export const kAndroid = 'android';
export const kIos = 'ios';
export const kMacos = 'macos';
export const kWeb = 'web';
export const kWindows = 'windows';
export const kLinux = 'linux';

// firebase.json keys
export const kFlutter = 'flutter';
export const kPlatforms = 'platforms';
export const kBuildConfiguration = 'buildConfigurations';
export const kTargets = 'targets';
export const kDefaultConfig = 'default';

export type PlatformKey =
  | typeof kAndroid
  | typeof kIos
  | typeof kMacos
  | typeof kWeb
  | typeof kWindows
  | typeof kLinux;

/** Platforms whose per-target configuration lives under `flutter.platforms`. */
export const APPLE_PLATFORMS = [kIos, kMacos] as const;

export type ApplePlatformKey = (typeof APPLE_PLATFORMS)[number];

export interface PlatformDescriptor {
  key: PlatformKey;
  name: string;
  /** Whether firebase.json carries per-target Apple configuration for it. */
  appleConfig: boolean;
}

export const SUPPORTED_PLATFORMS: readonly PlatformDescriptor[] = [
  { key: kAndroid, name: 'Android', appleConfig: false },
  { key: kIos, name: 'iOS', appleConfig: true },
  { key: kMacos, name: 'macOS', appleConfig: true },
  { key: kWeb, name: 'Web', appleConfig: false },
  { key: kWindows, name: 'Windows', appleConfig: false },
  { key: kLinux, name: 'Linux', appleConfig: false },
];

export enum ProjectConfiguration {
  Target = 'target',
  BuildConfiguration = 'buildConfiguration',
  DefaultConfig = 'defaultConfig',
}

export type ProjectConfigurationProperty =
  | typeof kTargets
  | typeof kBuildConfiguration
  | typeof kDefaultConfig;

export function getProjectConfigurationProperty(
  configuration: ProjectConfiguration,
): ProjectConfigurationProperty {
  switch (configuration) {
    case ProjectConfiguration.DefaultConfig:
      return kDefaultConfig;
    case ProjectConfiguration.BuildConfiguration:
      return kBuildConfiguration;
    case ProjectConfiguration.Target:
      return kTargets;
  }
}
