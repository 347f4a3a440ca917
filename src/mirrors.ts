/** Mirrors probed when `MIRRORS` is not set. */
export const DEFAULT_MIRRORS: readonly string[] = [
  'https://docker.1ms.run',
  'https://docker.1panel.live',
  'https://docker.m.ixdev.cn',
  'https://hub.rat.dev',
  'https://docker.xuanyuan.me',
  'https://dockerproxy.net',
  'https://docker.hlmirror.com',
  'https://hub1.nat.tf',
  'https://hub2.nat.tf',
  'https://hub3.nat.tf',
  'https://hub4.nat.tf',
  'https://docker.m.daocloud.io',
  'https://docker.kejilion.pro',
  'https://hub.1panel.dev',
  'https://dockerproxy.cool',
  'https://proxy.vvvv.ee',
  'https://dockerproxy.com',
  'https://docker.mirrors.ustc.edu.cn',
  'https://docker.nju.edu.cn',
];
