import path from "path";
import { ToolchainInstallError } from "../errors";
import { GRADLE_ID, JDK_ID, SDK_DIR } from "./catalog";
import { ToolchainState, latestInstalled } from "./state";

export type ToolchainEnv = {
  JAVA_HOME: string;
  ANDROID_SDK_ROOT: string;
  ANDROID_HOME: string;
  PATH: string;
};

function requireComponent(state: ToolchainState, id: string): string {
  const record = latestInstalled(state, id);
  if (!record) {
    throw new ToolchainInstallError(`Toolchain component ${id} is not installed under ${state.root}`, id);
  }
  return record.path;
}

export function javaHome(state: ToolchainState, platform: NodeJS.Platform = process.platform): string {
  const jdk = requireComponent(state, JDK_ID);
  return platform === "darwin" ? path.join(jdk, "Contents", "Home") : jdk;
}

export function sdkRoot(state: ToolchainState): string {
  return path.join(state.root, SDK_DIR);
}

export function gradleBinary(state: ToolchainState, platform: NodeJS.Platform = process.platform): string {
  const gradle = requireComponent(state, GRADLE_ID);
  return path.join(gradle, "bin", platform === "win32" ? "gradle.bat" : "gradle");
}

export function sdkmanagerBinary(sdk: string, platform: NodeJS.Platform = process.platform): string {
  return path.join(sdk, "cmdline-tools", "latest", "bin", platform === "win32" ? "sdkmanager.bat" : "sdkmanager");
}

/**
 * Environment for running the provisioned tools. Tool locations come only from `state`;
 * `basePath` is appended after them.
 */
export function toolchainEnv(
  state: ToolchainState,
  basePath = process.env.PATH ?? "",
  platform: NodeJS.Platform = process.platform
): ToolchainEnv {
  const home = javaHome(state, platform);
  const sdk = sdkRoot(state);
  const prefix = [
    path.join(home, "bin"),
    path.dirname(gradleBinary(state, platform)),
    path.dirname(sdkmanagerBinary(sdk, platform)),
    path.join(sdk, "platform-tools")
  ];
  const separator = platform === "win32" ? ";" : ":";
  return {
    JAVA_HOME: home,
    ANDROID_SDK_ROOT: sdk,
    ANDROID_HOME: sdk,
    PATH: basePath ? [...prefix, basePath].join(separator) : prefix.join(separator)
  };
}
