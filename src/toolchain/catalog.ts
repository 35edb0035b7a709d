export type ArchiveFormat = "zip" | "tar.gz";

export type ArchiveSource = {
  url: string;
  format: ArchiveFormat;
  sizeBytes?: number;
  sha256?: string;
};

type ComponentBase = {
  id: string;
  version: string;
  license?: string;
  // Path under the toolchain root; defaults to components/<id>/<version>.
  installDir?: string;
};

export type ArchiveComponent = ComponentBase & {
  kind: "archive";
  source: ArchiveSource;
};

export type SdkPackageComponent = ComponentBase & {
  kind: "sdk-package";
  source: { package: string };
};

export type ToolchainComponent = ArchiveComponent | SdkPackageComponent;

export const SDK_DIR = "android-sdk";
export const ANDROID_SDK_LICENSE = "android-sdk-license";

export const JDK_ID = "jdk";
export const GRADLE_ID = "gradle";
export const CMDLINE_TOOLS_ID = "cmdline-tools";

export type HostPlatform = {
  platform: NodeJS.Platform;
  arch: string;
};

function currentHost(): HostPlatform {
  return { platform: process.platform, arch: process.arch };
}

function temurinOs(platform: NodeJS.Platform): string {
  if (platform === "win32") {
    return "windows";
  }
  return platform === "darwin" ? "mac" : "linux";
}

function googleOs(platform: NodeJS.Platform): string {
  if (platform === "win32") {
    return "win";
  }
  return platform === "darwin" ? "mac" : "linux";
}

export function sdkPackagePath(pkg: string): string {
  return pkg.split(";").join("/");
}

export function installDirFor(component: ToolchainComponent): string {
  if (component.installDir) {
    return component.installDir;
  }
  if (component.kind === "sdk-package") {
    return `${SDK_DIR}/${sdkPackagePath(component.source.package)}`;
  }
  return `components/${component.id}/${component.version}`;
}

function sdkPackage(pkg: string, version: string): SdkPackageComponent {
  return {
    id: pkg.replace(/;/g, "-"),
    version,
    kind: "sdk-package",
    license: ANDROID_SDK_LICENSE,
    source: { package: pkg }
  };
}

export type SdkLevels = {
  compileSdk: number;
  buildToolsVersion: string;
};

export const DEFAULT_SDK_LEVELS: SdkLevels = { compileSdk: 34, buildToolsVersion: "34.0.0" };

/** Components needed to assemble a debug APK against the given SDK levels, in install order. */
export function defaultComponents(levels: SdkLevels = DEFAULT_SDK_LEVELS, host: HostPlatform = currentHost()): ToolchainComponent[] {
  const jdkArch = host.arch === "arm64" ? "aarch64" : "x64";
  const jdkFormat: ArchiveFormat = host.platform === "win32" ? "zip" : "tar.gz";
  return [
    {
      id: JDK_ID,
      version: "17",
      kind: "archive",
      source: {
        url: `https://api.adoptium.net/v3/binary/latest/17/ga/${temurinOs(host.platform)}/${jdkArch}/jdk/hotspot/normal/eclipse`,
        format: jdkFormat
      }
    },
    {
      id: GRADLE_ID,
      version: "8.7",
      kind: "archive",
      source: { url: "https://services.gradle.org/distributions/gradle-8.7-bin.zip", format: "zip" }
    },
    {
      id: CMDLINE_TOOLS_ID,
      version: "12.0",
      kind: "archive",
      license: ANDROID_SDK_LICENSE,
      installDir: `${SDK_DIR}/cmdline-tools/latest`,
      source: {
        url: `https://dl.google.com/android/repository/commandlinetools-${googleOs(host.platform)}-11076708_latest.zip`,
        format: "zip"
      }
    },
    sdkPackage("platform-tools", "34.0.0"),
    sdkPackage(`platforms;android-${levels.compileSdk}`, String(levels.compileSdk)),
    sdkPackage(`build-tools;${levels.buildToolsVersion}`, levels.buildToolsVersion)
  ];
}
