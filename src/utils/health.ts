export interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  memory: {
    usage: number;
    limit: number;
    healthy: boolean;
  };
  uptime: number;
}

export const DEFAULT_MEMORY_LIMIT_MB = 512;

// 检查内存使用情况
function checkMemory(limitMB: number): HealthStatus['memory'] {
  const usageMB = Math.round(process.memoryUsage().heapUsed / 1024 / 1024);

  return {
    usage: usageMB,
    limit: limitMB,
    healthy: usageMB < limitMB
  };
}

// 获取进程健康状态
export function getHealthStatus(memoryLimitMB: number = DEFAULT_MEMORY_LIMIT_MB): HealthStatus {
  const memory = checkMemory(memoryLimitMB);

  return {
    status: memory.healthy ? 'healthy' : 'unhealthy',
    timestamp: new Date().toISOString(),
    memory,
    uptime: Math.floor(process.uptime())
  };
}
